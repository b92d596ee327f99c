/** Every trace gate the engine emits, with the outcome it reports. */
export const TRACE_GATES = {
  'classify.winner': 'winner',
  'classify.no_winner': 'no_winner',
  'training.labeled': 'ingested',
  'training.batch': 'ingested',
  'dataset.skipped_label': 'skipped',
} as const;

export type TraceGate = keyof typeof TRACE_GATES;
export type TraceOutcome = (typeof TRACE_GATES)[TraceGate];

export type TraceEvent = {
  gate: TraceGate;
  outcome: TraceOutcome;
  meta?: Record<string, unknown>;
  at: string;
};

export function pushTrace(
  trace: TraceEvent[] | undefined,
  gate: TraceGate,
  meta?: Record<string, unknown>,
): void {
  if (!trace) return;
  trace.push({ gate, outcome: TRACE_GATES[gate], meta, at: new Date().toISOString() });
}

/** Events of one gate, in the order they were pushed. */
export const eventsFor = (trace: ReadonlyArray<TraceEvent>, gate: TraceGate) =>
  trace.filter((event) => event.gate === gate);

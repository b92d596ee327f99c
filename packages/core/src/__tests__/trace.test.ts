import { describe, expect, it } from 'vitest';
import { classifySample } from '../classifier/classify';
import { eventsFor, pushTrace, type TraceEvent } from '../trace';
import { ingestDataset } from '../training/trainer';
import { createVocabularyStore } from '../vocabulary/store';

describe('pushTrace', () => {
  it('fills in the outcome of the gate', () => {
    const trace: TraceEvent[] = [];
    pushTrace(trace, 'dataset.skipped_label', { skipped: 2 });
    pushTrace(trace, 'classify.no_winner');

    expect(trace.map((event) => [event.gate, event.outcome])).toEqual([
      ['dataset.skipped_label', 'skipped'],
      ['classify.no_winner', 'no_winner'],
    ]);
    expect(trace[0].meta).toEqual({ skipped: 2 });
    expect(trace[1].meta).toBeUndefined();
    expect(Number.isNaN(Date.parse(trace[0].at))).toBe(false);
  });

  it('does nothing without a trace', () => {
    expect(() => pushTrace(undefined, 'training.batch')).not.toThrow();
  });
});

describe('eventsFor', () => {
  it('picks one gate out of a run', () => {
    const store = createVocabularyStore();
    const trace: TraceEvent[] = [];
    ingestDataset(store, [{ language: 'english', text: 'hello' }], { trace });
    classifySample(store, 'hello', { trace });
    classifySample(store, 'nobody', { trace });
    classifySample(store, 'hello again', { trace });

    expect(eventsFor(trace, 'classify.winner').map((event) => event.meta?.tokenCount)).toEqual([
      1, 2,
    ]);
    expect(eventsFor(trace, 'classify.no_winner')).toHaveLength(1);
    expect(eventsFor(trace, 'training.batch')).toEqual([]);
  });
});

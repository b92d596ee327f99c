import { formatIssues, type ValidationResult } from '../validation';
import { EngineConfigSchema, EngineEnvSchema, type EngineConfig } from './schema';

export function validateEngineConfig(payload: unknown): ValidationResult<EngineConfig> {
  const parsed = EngineConfigSchema.safeParse(payload);
  if (!parsed.success) {
    return { ok: false, errors: formatIssues(parsed.error) };
  }
  return { ok: true, value: parsed.data };
}

export function loadEngineConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  const parsedEnv = EngineEnvSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw new Error(`Invalid engine config: ${formatIssues(parsedEnv.error).join(' | ')}`);
  }

  const vars = parsedEnv.data;
  const result = validateEngineConfig({
    epsilon: vars.GLOSSA_EPSILON,
    minWordLength: vars.GLOSSA_MIN_WORD_LENGTH,
    weightPolicy: vars.GLOSSA_WEIGHT_POLICY,
    adjustThreshold: vars.GLOSSA_ADJUST_THRESHOLD,
    axiomRatio: vars.GLOSSA_AXIOM_RATIO,
    debug: vars.GLOSSA_DEBUG,
  });
  if (!result.ok) {
    throw new Error(`Invalid engine config: ${result.errors.join(' | ')}`);
  }
  return result.value;
}

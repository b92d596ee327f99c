import { z } from 'zod';
import { DEFAULT_EPSILON } from '../classifier/classify';
import { WEIGHT_POLICY_NAMES } from '../classifier/weightPolicy';

export const WeightPolicyNameSchema = z.enum(WEIGHT_POLICY_NAMES);

export const EngineConfigSchema = z
  .object({
    epsilon: z.number().nonnegative().optional(),
    minWordLength: z.number().int().positive().optional(),
    weightPolicy: WeightPolicyNameSchema.optional(),
    adjustThreshold: z.number().int().nonnegative().optional(),
    axiomRatio: z.number().min(0).max(1).optional(),
    debug: z.boolean().optional(),
  })
  .default({})
  .transform((value) => ({
    epsilon: value.epsilon ?? DEFAULT_EPSILON,
    minWordLength: value.minWordLength ?? 1,
    weightPolicy: value.weightPolicy ?? 'mean',
    adjustThreshold: value.adjustThreshold ?? 6,
    axiomRatio: value.axiomRatio ?? 0.9,
    debug: value.debug ?? false,
  }));

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const envNumber = z.preprocess(blankToUndefined, z.coerce.number().optional());
const envFlag = z.preprocess(
  blankToUndefined,
  z
    .enum(['1', '0', 'true', 'false', 'yes', 'no'])
    .transform((value) => value === '1' || value === 'true' || value === 'yes')
    .optional(),
);

export const EngineEnvSchema = z.object({
  GLOSSA_EPSILON: envNumber,
  GLOSSA_MIN_WORD_LENGTH: envNumber,
  GLOSSA_WEIGHT_POLICY: z.preprocess(blankToUndefined, WeightPolicyNameSchema.optional()),
  GLOSSA_ADJUST_THRESHOLD: envNumber,
  GLOSSA_AXIOM_RATIO: envNumber,
  GLOSSA_DEBUG: envFlag,
});

export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
export type EngineConfig = z.output<typeof EngineConfigSchema>;

export * from './models';
export type { ValidationResult } from './validation';
export type { TraceEvent, TraceGate, TraceOutcome } from './trace';
export { TRACE_GATES, eventsFor, pushTrace } from './trace';

export { LANGUAGE_IDS, isLanguageId } from './languages/ids';
export type { LanguageProfile, LanguageRegistry } from './languages/registry';
export { buildLanguageRegistry, getDefaultRegistry, languageForName } from './languages/registry';
export { validateBlockTable, validateLanguageTable } from './languages/validate';
export * from './languages/schema';

export type { Alphabet, AlphabetKind } from './alphabet/alphabet';
export { blockAlphabet, letterAlphabet, mayContainWord, scriptAlphabet } from './alphabet/alphabet';

export type { TokenizerOptions } from './tokenizer/splitWords';
export { splitWords } from './tokenizer/splitWords';
export { normalizeSample } from './tokenizer/normalize';

export type { Vocabulary } from './vocabulary/vocabulary';
export { createVocabulary, normalizeWord } from './vocabulary/vocabulary';
export type { Dictionary, VocabularyStore } from './vocabulary/store';
export { createVocabularyStore } from './vocabulary/store';

export type { AdjustmentRound, WeightPolicy, WeightPolicyName } from './classifier/weightPolicy';
export {
  WEIGHT_POLICY_NAMES,
  clampWeight,
  createWeightPolicy,
  gatedMeanPolicy,
  meanPolicy,
  yieldPolicy,
} from './classifier/weightPolicy';
export type { ClassifyOptions } from './classifier/classify';
export { DEFAULT_EPSILON, classifySample, pickWinner } from './classifier/classify';

export type { RandomSource, TrainingOptions } from './training/trainer';
export { ingestDataset, ingestLabeled, ingestUnlabeledBatch, shuffle } from './training/trainer';

export type { Dataset, DatasetOptions } from './dataset/dataset';
export { loadDataset, parseCsvRows, parseDataset } from './dataset/dataset';

export type {
  BarSegments,
  LanguageTally,
  ValidationReport,
  Verdict,
  VocabularyDistribution,
} from './analysis/results';
export {
  analyzeValidation,
  findWinner,
  judge,
  rankContenders,
  stackedSegments,
  vocabularyDistribution,
} from './analysis/results';
export {
  formatDistribution,
  formatScores,
  formatValidationSummary,
  formatWinner,
} from './analysis/summary';

export type { EngineConfig, EngineConfigInput } from './config/schema';
export { EngineConfigSchema, EngineEnvSchema, WeightPolicyNameSchema } from './config/schema';
export { loadEngineConfig, validateEngineConfig } from './config/load';

export type { DetectorOptions, LanguageDetector } from './engine/detector';
export { createLanguageDetector } from './engine/detector';

export { createSampleCorpus } from './sample/corpus';

import type {
  BatchReport,
  ClassificationResult,
  LabeledRecord,
  LanguageId,
  WordSnapshot,
} from '../models';
import { classifySample } from '../classifier/classify';
import { createWeightPolicy, type WeightPolicy } from '../classifier/weightPolicy';
import { validateEngineConfig } from '../config/load';
import type { EngineConfig, EngineConfigInput } from '../config/schema';
import type { LanguageRegistry } from '../languages/registry';
import type { TraceEvent } from '../trace';
import { ingestDataset, ingestLabeled, ingestUnlabeledBatch, type RandomSource } from '../training/trainer';
import { createVocabularyStore, type Dictionary } from '../vocabulary/store';
import type { Vocabulary } from '../vocabulary/vocabulary';

export type DetectorOptions = {
  registry?: LanguageRegistry;
  /** Replaces the policy named in the config. */
  policy?: WeightPolicy;
  random?: RandomSource;
};

export type LanguageDetector = {
  config: EngineConfig;
  registry: LanguageRegistry;
  policy: WeightPolicy;
  ingestLabeled: (language: LanguageId, text: string) => WordSnapshot[];
  ingestDataset: (records: ReadonlyArray<LabeledRecord>, trace?: TraceEvent[]) => number;
  ingestUnlabeledBatch: (
    records: ReadonlyArray<LabeledRecord>,
    axiomRatio?: number,
    trace?: TraceEvent[],
  ) => BatchReport;
  classify: (sample: string, trace?: TraceEvent[]) => ClassificationResult;
  vocabulary: (language: LanguageId) => Vocabulary;
  dictionary: () => Dictionary;
};

export function createLanguageDetector(
  input?: EngineConfigInput,
  options: DetectorOptions = {},
): LanguageDetector {
  const validated = validateEngineConfig(input);
  if (!validated.ok) {
    throw new Error(`Invalid engine config: ${validated.errors.join(' | ')}`);
  }
  const config = validated.value;
  const store = createVocabularyStore(options.registry);
  const policy =
    options.policy ??
    createWeightPolicy(config.weightPolicy, { adjustThreshold: config.adjustThreshold });

  const runOptions = (trace?: TraceEvent[]) => ({
    epsilon: config.epsilon,
    minWordLength: config.minWordLength,
    policy,
    trace,
    random: options.random,
  });

  const classify = (sample: string, trace?: TraceEvent[]) => {
    const result = classifySample(store, sample, runOptions(trace));
    if (config.debug) {
      console.log('[glossa.classify]', {
        sample: sample.slice(0, 80),
        winner: result.winner?.language ?? null,
        score: result.winner?.score ?? 0,
      });
    }
    return result;
  };

  return {
    config,
    registry: store.registry,
    policy,
    ingestLabeled: (language, text) =>
      ingestLabeled(store, language, text, { minWordLength: config.minWordLength }),
    ingestDataset: (records, trace) => {
      const inserted = ingestDataset(store, records, runOptions(trace));
      if (config.debug) {
        console.log('[glossa.training] labeled', { records: records.length, axioms: inserted });
      }
      return inserted;
    },
    ingestUnlabeledBatch: (records, axiomRatio = config.axiomRatio, trace) => {
      const report = ingestUnlabeledBatch(store, records, axiomRatio, runOptions(trace));
      if (config.debug) {
        console.log('[glossa.training] batch', {
          axiomRecords: report.axiomRecords,
          classified: report.observations.length,
        });
      }
      return report;
    },
    classify,
    vocabulary: store.vocabulary,
    dictionary: store.dictionary,
  };
}

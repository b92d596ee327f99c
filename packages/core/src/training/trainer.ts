import type { BatchReport, LabeledRecord, LanguageId, WordSnapshot } from '../models';
import { classifySample, type ClassifyOptions } from '../classifier/classify';
import { splitWords } from '../tokenizer/splitWords';
import { pushTrace } from '../trace';
import type { VocabularyStore } from '../vocabulary/store';

export type RandomSource = () => number;

export type TrainingOptions = ClassifyOptions & {
  random?: RandomSource;
};

/** Fisher–Yates on a copy; `random` must return values in [0, 1). */
export function shuffle<T>(items: ReadonlyArray<T>, random: RandomSource = Math.random): T[] {
  const shuffled = [...items];
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }
  return shuffled;
}

export function ingestLabeled(
  store: VocabularyStore,
  language: LanguageId,
  text: string,
  options: Pick<TrainingOptions, 'minWordLength'> = {},
): WordSnapshot[] {
  const profile = store.registry.get(language);
  const vocabulary = store.vocabulary(language);
  return splitWords(profile, text, { minWordLength: options.minWordLength }).map((word) =>
    vocabulary.insertAxiom(word),
  );
}

/** Supervised ingestion of every record; returns the number of axioms written. */
export function ingestDataset(
  store: VocabularyStore,
  records: ReadonlyArray<LabeledRecord>,
  options: TrainingOptions = {},
): number {
  const inserted = records.reduce(
    (total, record) => total + ingestLabeled(store, record.language, record.text, options).length,
    0,
  );
  pushTrace(options.trace, 'training.labeled', { records: records.length, axioms: inserted });
  return inserted;
}

/**
 * Shuffles `records`, learns the first `axiomRatio` share as axioms and classifies
 * the rest without their labels. Each held-out label is only kept next to its result.
 */
export function ingestUnlabeledBatch(
  store: VocabularyStore,
  records: ReadonlyArray<LabeledRecord>,
  axiomRatio: number,
  options: TrainingOptions = {},
): BatchReport {
  const ratio = Number.isFinite(axiomRatio) ? Math.min(1, Math.max(0, axiomRatio)) : 0;
  const shuffled = shuffle(records, options.random);
  const cut = Math.floor(shuffled.length * ratio);
  const axiomPart = shuffled.slice(0, cut);
  const heldOut = shuffled.slice(cut);

  axiomPart.forEach((record) => ingestLabeled(store, record.language, record.text, options));

  const observations = heldOut.map((record) => ({
    expected: record.language,
    result: classifySample(store, record.text, options),
  }));

  pushTrace(options.trace, 'training.batch', {
    axiomRecords: axiomPart.length,
    classified: heldOut.length,
    ratio,
  });

  return { axiomRecords: axiomPart.length, observations };
}

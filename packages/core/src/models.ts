import type { LanguageId } from './languages/ids';

export type { LanguageId } from './languages/ids';

export type EntryKind = 'axiom' | 'induction';
export type Segmentation = 'whitespace' | 'character';

export type AxiomEntry = {
  kind: 'axiom';
  language: LanguageId;
  text: string;
  weight: 1;
};

export type InductionEntry = {
  kind: 'induction';
  language: LanguageId;
  text: string;
  weight: number;
};

export type WordEntry = AxiomEntry | InductionEntry;

/** Frozen copy of an entry; its weight no longer follows the vocabulary. */
export type WordSnapshot = Readonly<WordEntry>;

export type LanguageScore = {
  language: LanguageId;
  score: number;
  words: ReadonlyArray<WordSnapshot>;
};

export type ClassificationResult = {
  sample: string;
  scores: ReadonlyArray<LanguageScore>;
  winner: LanguageScore | null;
};

export type LabeledRecord = {
  language: LanguageId;
  text: string;
};

export type ValidationObservation = {
  expected: LanguageId;
  result: ClassificationResult;
};

export type BatchReport = {
  axiomRecords: number;
  observations: ValidationObservation[];
};

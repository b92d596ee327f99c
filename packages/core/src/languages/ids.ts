export const LANGUAGE_IDS = [
  'thai',
  'indonesian',
  'spanish',
  'estonian',
  'russian',
  'arabic',
  'latin',
  'persian',
  'chinese',
  'japanese',
  'korean',
  'hindi',
  'french',
  'turkish',
  'english',
  'tamil',
  'romanian',
  'dutch',
  'portuguese',
  'pushto',
  'swedish',
  'urdu',
] as const;

export type LanguageId = (typeof LANGUAGE_IDS)[number];

export const isLanguageId = (value: string): value is LanguageId =>
  LANGUAGE_IDS.some((id) => id === value);

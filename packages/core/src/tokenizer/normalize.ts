const APOSTROPHES = /[‘’ʼ]/g;
const NOT_WORD_MATERIAL = /[^\p{L}\p{White_Space}'\p{Pd}]+/gu;
const EDGE_APOSTROPHES = /^'+|'+$/g;

export const WORD_SEPARATORS = /[\p{White_Space}\p{Pd}]+/u;
export const LETTER = /^\p{L}$/u;
export const HAS_LETTER = /\p{L}/u;

/** NFC, trimmed, lower-cased, typographic apostrophes folded to `'`. */
export function normalizeSample(text: string): string {
  return (text ?? '').normalize('NFC').trim().toLowerCase().replace(APOSTROPHES, "'");
}

/** Drops everything but letters, whitespace, apostrophes and dashes. */
export function keepWordMaterial(normalized: string): string {
  return normalized.replace(NOT_WORD_MATERIAL, '');
}

export function trimApostrophes(token: string): string {
  return token.replace(EDGE_APOSTROPHES, '');
}

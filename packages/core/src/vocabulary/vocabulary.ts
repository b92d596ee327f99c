import type { LanguageId, WordEntry, WordSnapshot } from '../models';
import { clampWeight } from '../classifier/weightPolicy';

export type Vocabulary = {
  language: LanguageId;
  size: () => number;
  has: (text: string) => boolean;
  get: (text: string) => WordSnapshot | null;
  /** Always wins: replaces an induction entry of the same text. */
  insertAxiom: (text: string) => WordSnapshot;
  lookupOrCreateInduction: (text: string) => WordSnapshot;
  /**
   * Entries for `tokens`, creating inductions for the unknown ones, but only when
   * at least one token is already known. Otherwise nothing is created and the result is empty.
   */
  resolveSample: (tokens: ReadonlyArray<string>) => WordSnapshot[];
  /**
   * Applies `update` once per occurrence of an induction in `texts`, so a repeated word
   * moves once for each time it appears. Axioms are skipped. Returns the number of updates.
   */
  adjustInductions: (texts: ReadonlyArray<string>, update: (weight: number) => number) => number;
  snapshot: () => WordSnapshot[];
};

export const normalizeWord = (text: string) => text.normalize('NFC').trim().toLowerCase();

const freeze = (entry: WordEntry): WordSnapshot => Object.freeze({ ...entry });

/**
 * The entry map never leaves this closure. Every method runs to completion
 * synchronously, so one language's entries are never mutated by two callers at once.
 */
export function createVocabulary(language: LanguageId): Vocabulary {
  const entries = new Map<string, WordEntry>();

  const lookupOrCreate = (key: string): WordEntry => {
    const existing = entries.get(key);
    if (existing) return existing;
    const created: WordEntry = { kind: 'induction', language, text: key, weight: 0 };
    entries.set(key, created);
    return created;
  };

  return {
    language,
    size: () => entries.size,
    has: (text) => entries.has(normalizeWord(text)),
    get: (text) => {
      const entry = entries.get(normalizeWord(text));
      return entry ? freeze(entry) : null;
    },
    insertAxiom: (text) => {
      const key = normalizeWord(text);
      const axiom: WordEntry = { kind: 'axiom', language, text: key, weight: 1 };
      entries.set(key, axiom);
      return freeze(axiom);
    },
    lookupOrCreateInduction: (text) => freeze(lookupOrCreate(normalizeWord(text))),
    resolveSample: (tokens) => {
      const keys = tokens.map(normalizeWord);
      if (!keys.some((key) => entries.has(key))) {
        return [];
      }
      return keys.map((key) => freeze(lookupOrCreate(key)));
    },
    adjustInductions: (texts, update) => {
      let adjusted = 0;
      texts.forEach((text) => {
        const entry = entries.get(normalizeWord(text));
        if (!entry || entry.kind !== 'induction') return;
        entry.weight = clampWeight(update(entry.weight));
        adjusted += 1;
      });
      return adjusted;
    },
    snapshot: () => Array.from(entries.values(), freeze),
  };
}

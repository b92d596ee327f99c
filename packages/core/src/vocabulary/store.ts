import type { LanguageId, WordSnapshot } from '../models';
import { getDefaultRegistry, type LanguageRegistry } from '../languages/registry';
import { createVocabulary, type Vocabulary } from './vocabulary';

export type Dictionary = ReadonlyMap<LanguageId, WordSnapshot[]>;

export type VocabularyStore = {
  registry: LanguageRegistry;
  vocabulary: (language: LanguageId) => Vocabulary;
  /** Snapshot of every language's entries, in enumeration order. */
  dictionary: () => Dictionary;
};

/** One vocabulary per registered language, created up front; none is added later. */
export function createVocabularyStore(
  registry: LanguageRegistry = getDefaultRegistry(),
): VocabularyStore {
  const vocabularies = new Map<LanguageId, Vocabulary>(
    registry.languages.map((profile) => [profile.id, createVocabulary(profile.id)]),
  );

  const vocabulary = (language: LanguageId): Vocabulary => {
    const found = vocabularies.get(language);
    if (!found) {
      throw new Error(`Language ${language} has no vocabulary.`);
    }
    return found;
  };

  return {
    registry,
    vocabulary,
    dictionary: () =>
      new Map<LanguageId, WordSnapshot[]>(
        registry.languages.map((profile) => [profile.id, vocabulary(profile.id).snapshot()]),
      ),
  };
}

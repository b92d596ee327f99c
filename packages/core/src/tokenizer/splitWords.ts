import { mayContainWord } from '../alphabet/alphabet';
import type { LanguageProfile } from '../languages/registry';
import {
  HAS_LETTER,
  LETTER,
  WORD_SEPARATORS,
  keepWordMaterial,
  normalizeSample,
  trimApostrophes,
} from './normalize';

export type TokenizerOptions = {
  /** Shorter words are dropped. Only applies to whitespace-segmented languages. */
  minWordLength?: number;
};

const codePointLength = (word: string) => Array.from(word).length;

function splitOnWhitespace(
  profile: LanguageProfile,
  text: string,
  minWordLength: number,
): string[] {
  return keepWordMaterial(normalizeSample(text))
    .split(WORD_SEPARATORS)
    .map(trimApostrophes)
    .filter(
      (word) =>
        HAS_LETTER.test(word) &&
        codePointLength(word) >= minWordLength &&
        mayContainWord(profile.alphabet, word),
    );
}

function splitPerCharacter(profile: LanguageProfile, text: string): string[] {
  return Array.from(normalizeSample(text)).filter(
    (char) => LETTER.test(char) && profile.alphabet.mayContain(char),
  );
}

/**
 * Candidate words of `text` for one language, in order of appearance.
 * Duplicates are kept; characters outside the language's alphabet never reach a token.
 */
export function splitWords(
  profile: LanguageProfile,
  text: string,
  options: TokenizerOptions = {},
): string[] {
  if (profile.segmentation === 'character') {
    return splitPerCharacter(profile, text);
  }
  return splitOnWhitespace(profile, text, Math.max(1, options.minWordLength ?? 1));
}

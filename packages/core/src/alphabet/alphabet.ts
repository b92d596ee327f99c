import type { AlphabetSpec, CodePointRange, ScriptName, UnicodeBlock } from '../languages/schema';

export type AlphabetKind = AlphabetSpec['kind'];

export type Alphabet = {
  kind: AlphabetKind;
  /** `char` is a single code point; anything longer is rejected. */
  mayContain: (char: string) => boolean;
};

const singleCodePoint = (char: string): number | null => {
  const codePoint = char.codePointAt(0);
  if (codePoint === undefined) return null;
  return String.fromCodePoint(codePoint).length === char.length ? codePoint : null;
};

const inRanges = (codePoint: number, ranges: ReadonlyArray<CodePointRange>) =>
  ranges.some((range) => codePoint >= range.from && codePoint <= range.to);

export function letterAlphabet(ranges: ReadonlyArray<CodePointRange>, chars: string): Alphabet {
  const extra = new Set(Array.from(chars, (char) => char.codePointAt(0) ?? -1));
  return {
    kind: 'letters',
    mayContain: (char) => {
      const codePoint = singleCodePoint(char);
      if (codePoint === null) return false;
      return extra.has(codePoint) || inRanges(codePoint, ranges);
    },
  };
}

export function scriptAlphabet(scripts: ReadonlyArray<ScriptName>): Alphabet {
  const classes = scripts.map((script) => `\\p{Script=${script}}`).join('');
  const pattern = new RegExp(`^[${classes}]$`, 'u');
  return {
    kind: 'script',
    mayContain: (char) => pattern.test(char),
  };
}

export function blockAlphabet(blocks: ReadonlyArray<UnicodeBlock>): Alphabet {
  const ranges = blocks.map((block) => block.range);
  return {
    kind: 'block',
    mayContain: (char) => {
      const codePoint = singleCodePoint(char);
      return codePoint !== null && inRanges(codePoint, ranges);
    },
  };
}

/** True when every code point of `word` passes; the empty word is rejected. */
export function mayContainWord(alphabet: Alphabet, word: string): boolean {
  const chars = Array.from(word);
  return chars.length > 0 && chars.every((char) => alphabet.mayContain(char));
}

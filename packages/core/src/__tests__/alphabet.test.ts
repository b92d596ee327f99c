import { describe, expect, it } from 'vitest';
import { blockAlphabet, letterAlphabet, mayContainWord, scriptAlphabet } from '../alphabet/alphabet';

describe('letter alphabets', () => {
  const spanishLike = letterAlphabet([{ from: 0x61, to: 0x7a }], 'ñ');

  it('accepts range bounds and extra letters', () => {
    expect(spanishLike.mayContain('a')).toBe(true);
    expect(spanishLike.mayContain('z')).toBe(true);
    expect(spanishLike.mayContain('ñ')).toBe(true);
  });

  it('rejects characters outside the set', () => {
    expect(spanishLike.mayContain('A')).toBe(false);
    expect(spanishLike.mayContain('é')).toBe(false);
  });

  it('only judges single code points', () => {
    expect(spanishLike.mayContain('ab')).toBe(false);
    expect(spanishLike.mayContain('')).toBe(false);
  });

  it('handles code points beyond the BMP', () => {
    const tamilSupplement = letterAlphabet([{ from: 0x11fc0, to: 0x11fff }], '');
    expect(tamilSupplement.mayContain('\u{11FC0}')).toBe(true);
    expect(tamilSupplement.mayContain('῀')).toBe(false);
  });
});

describe('script alphabets', () => {
  it('matches the Unicode script of a character', () => {
    const cyrillic = scriptAlphabet(['Cyrillic']);
    expect(cyrillic.mayContain('ж')).toBe(true);
    expect(cyrillic.mayContain('z')).toBe(false);
  });

  it('accepts any of several scripts', () => {
    const japanese = scriptAlphabet(['Hiragana', 'Katakana', 'Han']);
    expect(japanese.mayContain('す')).toBe(true);
    expect(japanese.mayContain('カ')).toBe(true);
    expect(japanese.mayContain('字')).toBe(true);
    expect(japanese.mayContain('가')).toBe(false);
  });
});

describe('block alphabets', () => {
  it('accepts only code points inside the blocks', () => {
    const basicLatin = blockAlphabet([{ name: 'Basic Latin', range: { from: 0x0, to: 0x7f } }]);
    expect(basicLatin.kind).toBe('block');
    expect(basicLatin.mayContain('a')).toBe(true);
    expect(basicLatin.mayContain('é')).toBe(false);
  });
});

describe('mayContainWord', () => {
  const english = letterAlphabet([{ from: 0x61, to: 0x7a }], "'");

  it('requires every character to pass', () => {
    expect(mayContainWord(english, "don't")).toBe(true);
    expect(mayContainWord(english, 'café')).toBe(false);
  });

  it('rejects the empty word', () => {
    expect(mayContainWord(english, '')).toBe(false);
  });
});

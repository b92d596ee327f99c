import { describe, expect, it } from 'vitest';
import { createVocabulary } from '../vocabulary/vocabulary';
import { createVocabularyStore } from '../vocabulary/store';

describe('vocabulary entries', () => {
  it('stores axioms under their normalized text', () => {
    const vocabulary = createVocabulary('english');
    expect(vocabulary.insertAxiom(' Hello ')).toEqual({
      kind: 'axiom',
      language: 'english',
      text: 'hello',
      weight: 1,
    });
    expect(vocabulary.has('HELLO')).toBe(true);
    expect(vocabulary.size()).toBe(1);
  });

  it('creates inductions at weight 0 and returns existing entries of either kind', () => {
    const vocabulary = createVocabulary('english');
    vocabulary.insertAxiom('hello');
    expect(vocabulary.lookupOrCreateInduction('there')).toEqual({
      kind: 'induction',
      language: 'english',
      text: 'there',
      weight: 0,
    });
    expect(vocabulary.lookupOrCreateInduction('hello').kind).toBe('axiom');
    expect(vocabulary.size()).toBe(2);
  });

  it('lets an axiom replace an induction of the same text', () => {
    const vocabulary = createVocabulary('spanish');
    vocabulary.lookupOrCreateInduction('mundo');
    vocabulary.adjustInductions(['mundo'], () => 0.5);
    vocabulary.insertAxiom('mundo');
    expect(vocabulary.get('mundo')).toEqual({
      kind: 'axiom',
      language: 'spanish',
      text: 'mundo',
      weight: 1,
    });
    expect(vocabulary.size()).toBe(1);
  });

  it('returns null for unknown words', () => {
    expect(createVocabulary('english').get('nothing')).toBeNull();
  });
});

describe('resolveSample', () => {
  it('creates nothing when no token is known', () => {
    const vocabulary = createVocabulary('english');
    vocabulary.insertAxiom('hello');
    expect(vocabulary.resolveSample(['foo', 'bar'])).toEqual([]);
    expect(vocabulary.size()).toBe(1);
  });

  it('creates inductions for unknown tokens once one token is known', () => {
    const vocabulary = createVocabulary('english');
    vocabulary.insertAxiom('hello');
    const words = vocabulary.resolveSample(['hello', 'new', 'new']);
    expect(words.map((word) => [word.text, word.kind, word.weight])).toEqual([
      ['hello', 'axiom', 1],
      ['new', 'induction', 0],
      ['new', 'induction', 0],
    ]);
    expect(vocabulary.size()).toBe(2);
  });
});

describe('adjustInductions', () => {
  it('updates an induction once per occurrence and leaves axioms alone', () => {
    const vocabulary = createVocabulary('english');
    vocabulary.insertAxiom('hello');
    vocabulary.lookupOrCreateInduction('there');
    const adjusted = vocabulary.adjustInductions(['there', 'there', 'hello'], (weight) => weight + 0.3);
    expect(adjusted).toBe(2);
    expect(vocabulary.get('there')?.weight).toBeCloseTo(0.6);
    expect(vocabulary.get('hello')?.weight).toBe(1);
  });

  it('keeps weights inside [0, 1]', () => {
    const vocabulary = createVocabulary('english');
    vocabulary.lookupOrCreateInduction('up');
    vocabulary.lookupOrCreateInduction('down');
    vocabulary.adjustInductions(['up'], () => 5);
    vocabulary.adjustInductions(['down'], () => -1);
    expect(vocabulary.get('up')?.weight).toBe(1);
    expect(vocabulary.get('down')?.weight).toBe(0);
    vocabulary.adjustInductions(['down'], () => Number.POSITIVE_INFINITY);
    expect(vocabulary.get('down')?.weight).toBe(1);
    vocabulary.adjustInductions(['up'], () => Number.NaN);
    expect(vocabulary.get('up')?.weight).toBe(0);
  });

  it('ignores words the vocabulary does not hold', () => {
    expect(createVocabulary('english').adjustInductions(['ghost'], () => 1)).toBe(0);
  });
});

describe('snapshots', () => {
  it('are frozen and do not follow later adjustments', () => {
    const vocabulary = createVocabulary('english');
    vocabulary.lookupOrCreateInduction('there');
    const before = vocabulary.snapshot();
    vocabulary.adjustInductions(['there'], () => 0.75);

    expect(Object.isFrozen(before[0])).toBe(true);
    expect(before[0].weight).toBe(0);
    expect(vocabulary.snapshot()[0].weight).toBe(0.75);
  });
});

describe('vocabulary store', () => {
  it('holds one vocabulary per language and snapshots them all', () => {
    const store = createVocabularyStore();
    store.vocabulary('english').insertAxiom('hello');
    store.vocabulary('thai').insertAxiom('ส');

    const dictionary = store.dictionary();
    expect(dictionary.size).toBe(store.registry.languages.length);
    expect(dictionary.get('english')?.map((word) => word.text)).toEqual(['hello']);
    expect(dictionary.get('thai')?.map((word) => word.text)).toEqual(['ส']);
    expect(dictionary.get('french')).toEqual([]);
  });

  it('keeps vocabularies apart', () => {
    const store = createVocabularyStore();
    store.vocabulary('english').insertAxiom('hola');
    expect(store.vocabulary('spanish').has('hola')).toBe(false);
  });
});

import languageTableJson from '../data/languages.json';
import blockTableJson from '../data/unicode-blocks.json';
import { blockAlphabet, letterAlphabet, scriptAlphabet, type Alphabet } from '../alphabet/alphabet';
import type { Segmentation } from '../models';
import { LANGUAGE_IDS, type LanguageId } from './ids';
import type { AlphabetSpec, UnicodeBlockTable } from './schema';
import { validateBlockTable, validateLanguageTable } from './validate';

export type LanguageProfile = {
  id: LanguageId;
  aliases: ReadonlyArray<string>;
  segmentation: Segmentation;
  alphabet: Alphabet;
};

export type LanguageRegistry = {
  /** Every language, in enumeration order. Scoring ties go to the earlier one. */
  languages: ReadonlyArray<LanguageProfile>;
  get: (id: LanguageId) => LanguageProfile;
  forName: (name: string) => LanguageId | null;
};

const buildAlphabet = (spec: AlphabetSpec, blocks: UnicodeBlockTable): Alphabet => {
  switch (spec.kind) {
    case 'letters':
      return letterAlphabet(spec.ranges, spec.chars);
    case 'script':
      return scriptAlphabet(spec.scripts);
    case 'block':
      return blockAlphabet(blocks.blocks.filter((block) => spec.blocks.includes(block.name)));
  }
};

const normalizeName = (name: string) => name.trim().toLowerCase();

export function buildLanguageRegistry(
  tablePayload: unknown = languageTableJson,
  blockPayload: unknown = blockTableJson,
): LanguageRegistry {
  const blocks = validateBlockTable(blockPayload);
  if (!blocks.ok) {
    throw new Error(`Invalid unicode block table: ${blocks.errors.join(' | ')}`);
  }
  const table = validateLanguageTable(tablePayload, blocks.value);
  if (!table.ok) {
    throw new Error(`Invalid language table: ${table.errors.join(' | ')}`);
  }

  const byId = new Map<LanguageId, LanguageProfile>();
  const byName = new Map<string, LanguageId>();
  table.value.languages.forEach((spec) => {
    byId.set(spec.id, {
      id: spec.id,
      aliases: spec.aliases,
      segmentation: spec.segmentation,
      alphabet: buildAlphabet(spec.alphabet, blocks.value),
    });
    [spec.id, ...spec.aliases].forEach((name) => byName.set(normalizeName(name), spec.id));
  });

  const get = (id: LanguageId): LanguageProfile => {
    const profile = byId.get(id);
    if (!profile) {
      throw new Error(`Language ${id} is not registered.`);
    }
    return profile;
  };

  return {
    languages: LANGUAGE_IDS.map(get),
    get,
    forName: (name) => byName.get(normalizeName(name)) ?? null,
  };
}

let cachedRegistry: LanguageRegistry | null = null;

export function getDefaultRegistry(): LanguageRegistry {
  if (!cachedRegistry) {
    cachedRegistry = buildLanguageRegistry();
  }
  return cachedRegistry;
}

export function languageForName(name: string): LanguageId | null {
  return getDefaultRegistry().forName(name);
}

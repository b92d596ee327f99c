import { formatIssues, type ValidationResult } from '../validation';
import { LANGUAGE_IDS } from './ids';
import {
  LanguageTableSchema,
  UnicodeBlockTableSchema,
  type LanguageTable,
  type UnicodeBlockTable,
} from './schema';

export function validateBlockTable(payload: unknown): ValidationResult<UnicodeBlockTable> {
  const parsed = UnicodeBlockTableSchema.safeParse(payload);
  if (!parsed.success) {
    return { ok: false, errors: formatIssues(parsed.error) };
  }

  const errors: string[] = [];
  const seen = new Set<string>();
  parsed.data.blocks.forEach((block) => {
    if (seen.has(block.name)) {
      errors.push(`Block "${block.name}" is declared twice.`);
    }
    seen.add(block.name);
  });

  if (errors.length > 0) {
    return { ok: false, errors };
  }
  return { ok: true, value: parsed.data };
}

export function validateLanguageTable(
  payload: unknown,
  blocks: UnicodeBlockTable,
): ValidationResult<LanguageTable> {
  const parsed = LanguageTableSchema.safeParse(payload);
  if (!parsed.success) {
    return { ok: false, errors: formatIssues(parsed.error) };
  }

  const table = parsed.data;
  const errors: string[] = [];

  const configured = new Map<string, number>();
  table.languages.forEach((language) => {
    configured.set(language.id, (configured.get(language.id) ?? 0) + 1);
  });
  LANGUAGE_IDS.forEach((id) => {
    const count = configured.get(id) ?? 0;
    if (count === 0) {
      errors.push(`Language ${id} has no configuration.`);
    } else if (count > 1) {
      errors.push(`Language ${id} is configured ${count} times.`);
    }
  });

  const blockNames = new Set(blocks.blocks.map((block) => block.name));
  const owners = new Map<string, string>();
  table.languages.forEach((language) => {
    const { alphabet } = language;
    if (alphabet.kind === 'letters' && alphabet.ranges.length === 0 && alphabet.chars.length === 0) {
      errors.push(`Language ${language.id} has an empty letter set.`);
    }
    if (alphabet.kind === 'block') {
      alphabet.blocks
        .filter((name) => !blockNames.has(name))
        .forEach((name) => errors.push(`Language ${language.id} uses unknown block "${name}".`));
    }

    [language.id, ...language.aliases].forEach((name) => {
      const key = name.trim().toLowerCase();
      const owner = owners.get(key);
      if (owner && owner !== language.id) {
        errors.push(`Name "${key}" is claimed by both ${owner} and ${language.id}.`);
      }
      owners.set(key, language.id);
    });
  });

  if (errors.length > 0) {
    return { ok: false, errors };
  }
  return { ok: true, value: table };
}

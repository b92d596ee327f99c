import { z } from 'zod';
import { LANGUAGE_IDS } from './ids';

export const SCRIPT_NAMES = [
  'Latin',
  'Greek',
  'Cyrillic',
  'Hebrew',
  'Arabic',
  'Devanagari',
  'Tamil',
  'Thai',
  'Hangul',
  'Hiragana',
  'Katakana',
  'Han',
] as const;

const parseCodePoint = (hex: string) => Number.parseInt(hex, 16);

export const CodePointRangeSchema = z
  .string()
  .regex(/^[0-9A-Fa-f]{4,6}-[0-9A-Fa-f]{4,6}$/, 'Range must look like "0061-007A"')
  .transform((value) => {
    const [from, to] = value.split('-');
    return { from: parseCodePoint(from), to: parseCodePoint(to) };
  })
  .refine((range) => range.from <= range.to, 'Range start must not exceed its end');

export const ScriptNameSchema = z.enum(SCRIPT_NAMES);
export const SegmentationSchema = z.enum(['whitespace', 'character']);

export const LettersAlphabetSchema = z.object({
  kind: z.literal('letters'),
  ranges: z.array(CodePointRangeSchema).default([]),
  chars: z.string().default(''),
});

export const ScriptAlphabetSchema = z.object({
  kind: z.literal('script'),
  scripts: z.array(ScriptNameSchema).min(1),
});

export const BlockAlphabetSchema = z.object({
  kind: z.literal('block'),
  blocks: z.array(z.string().min(1)).min(1),
});

export const AlphabetSpecSchema = z.discriminatedUnion('kind', [
  LettersAlphabetSchema,
  ScriptAlphabetSchema,
  BlockAlphabetSchema,
]);

export const LanguageSpecSchema = z.object({
  id: z.enum(LANGUAGE_IDS),
  aliases: z.array(z.string().min(1)).default([]),
  segmentation: SegmentationSchema,
  alphabet: AlphabetSpecSchema,
});

export const LanguageTableSchema = z.object({
  version: z.string().min(1),
  languages: z.array(LanguageSpecSchema).min(1),
});

export const UnicodeBlockSchema = z.object({
  name: z.string().min(1),
  range: CodePointRangeSchema,
});

export const UnicodeBlockTableSchema = z.object({
  version: z.string().min(1),
  blocks: z.array(UnicodeBlockSchema).min(1),
});

export type ScriptName = z.infer<typeof ScriptNameSchema>;
export type CodePointRange = z.infer<typeof CodePointRangeSchema>;
export type AlphabetSpec = z.infer<typeof AlphabetSpecSchema>;
export type LanguageSpec = z.infer<typeof LanguageSpecSchema>;
export type LanguageTable = z.infer<typeof LanguageTableSchema>;
export type UnicodeBlock = z.infer<typeof UnicodeBlockSchema>;
export type UnicodeBlockTable = z.infer<typeof UnicodeBlockTableSchema>;

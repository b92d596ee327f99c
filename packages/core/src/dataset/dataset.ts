/**
 * CSV datasets of `text,language` rows. The label is the last field, so unquoted
 * text may still contain commas. Quoted fields follow RFC 4180 (`""` escapes a quote).
 */

import { promises as fs } from 'node:fs';
import type { LabeledRecord } from '../models';
import { languageForName, type LanguageRegistry } from '../languages/registry';
import { pushTrace, type TraceEvent } from '../trace';

export type Dataset = {
  records: LabeledRecord[];
  /** Rows whose label names no known language. */
  skipped: number;
};

export type DatasetOptions = {
  registry?: LanguageRegistry;
  trace?: TraceEvent[];
};

export function parseCsvRows(raw: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;

  const endField = () => {
    row.push(field);
    field = '';
  };
  const endRow = () => {
    endField();
    if (row.some((value) => value.trim().length > 0)) {
      rows.push(row);
    }
    row = [];
  };

  for (let i = 0; i < raw.length; i++) {
    const char = raw[i];
    if (quoted) {
      if (char === '"' && raw[i + 1] === '"') {
        field += '"';
        i++;
      } else if (char === '"') {
        quoted = false;
      } else {
        field += char;
      }
      continue;
    }
    if (char === '"' && field.length === 0) {
      quoted = true;
    } else if (char === ',') {
      endField();
    } else if (char === '\n') {
      endRow();
    } else if (char !== '\r') {
      field += char;
    }
  }
  if (field.length > 0 || row.length > 0) {
    endRow();
  }
  return rows;
}

const isHeader = (row: string[]) => row[row.length - 1]?.trim().toLowerCase() === 'language';

export function parseDataset(raw: string, options: DatasetOptions = {}): Dataset {
  const resolve = options.registry?.forName ?? languageForName;
  const rows = parseCsvRows(raw ?? '');
  const body = rows.length > 0 && isHeader(rows[0]) ? rows.slice(1) : rows;

  const records: LabeledRecord[] = [];
  let skipped = 0;
  body.forEach((row) => {
    const label = row.length > 1 ? row[row.length - 1] : '';
    const language = resolve(label);
    if (!language) {
      skipped++;
      return;
    }
    records.push({ language, text: row.slice(0, -1).join(',') });
  });

  if (skipped > 0) {
    pushTrace(options.trace, 'dataset.skipped_label', { skipped, kept: records.length });
  }
  return { records, skipped };
}

/** A missing file reads as an empty dataset; other read errors propagate. */
export async function loadDataset(filePath: string, options: DatasetOptions = {}): Promise<Dataset> {
  try {
    const raw = await fs.readFile(filePath, 'utf-8');
    return parseDataset(raw, options);
  } catch (err) {
    const code = err && typeof err === 'object' && 'code' in err ? err.code : '';
    if (code === 'ENOENT') return { records: [], skipped: 0 };
    throw err;
  }
}

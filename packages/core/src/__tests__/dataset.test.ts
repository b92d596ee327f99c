import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';
import { loadDataset, parseCsvRows, parseDataset } from '../dataset/dataset';
import type { TraceEvent } from '../trace';

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

describe('parseCsvRows', () => {
  it('handles quoted fields and escaped quotes', () => {
    expect(parseCsvRows('a,b\n"c, d","e ""x"""\n')).toEqual([
      ['a', 'b'],
      ['c, d', 'e "x"'],
    ]);
  });

  it('drops blank rows and carriage returns', () => {
    expect(parseCsvRows('a,b\r\n\r\n,\nc,d')).toEqual([
      ['a', 'b'],
      ['c', 'd'],
    ]);
  });
});

describe('parseDataset', () => {
  it('reads labels from the last field and skips unknown ones', () => {
    const trace: TraceEvent[] = [];
    const dataset = parseDataset(
      [
        'text,language',
        'hello there,English',
        'bom dia,Portugese',
        'guten tag,German',
        'well, hello,english',
      ].join('\n'),
      { trace },
    );

    expect(dataset.records).toEqual([
      { language: 'english', text: 'hello there' },
      { language: 'portuguese', text: 'bom dia' },
      { language: 'english', text: 'well, hello' },
    ]);
    expect(dataset.skipped).toBe(1);
    expect(trace[0].gate).toBe('dataset.skipped_label');
    expect(trace[0].meta).toEqual({ skipped: 1, kept: 3 });
  });

  it('keeps the first row when it is not a header', () => {
    expect(parseDataset('hola,spanish').records).toEqual([{ language: 'spanish', text: 'hola' }]);
  });

  it('counts rows without a label as skipped', () => {
    expect(parseDataset('just text\n').skipped).toBe(1);
  });

  it('reads nothing from empty input', () => {
    expect(parseDataset('')).toEqual({ records: [], skipped: 0 });
  });
});

describe('loadDataset', () => {
  it('reads a csv file', async () => {
    const dataset = await loadDataset(fixture('records.csv'));
    expect(dataset.records).toEqual([
      { language: 'english', text: 'the sun is warm, the sea is calm' },
      { language: 'spanish', text: 'el sol calienta' },
      { language: 'french', text: 'le soleil brille' },
    ]);
    expect(dataset.skipped).toBe(1);
  });

  it('treats a missing file as empty', async () => {
    await expect(loadDataset(fixture('missing.csv'))).resolves.toEqual({ records: [], skipped: 0 });
  });
});

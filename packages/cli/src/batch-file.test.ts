import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { resolve } from 'node:path';
import { ConfigError } from '@esgrade/core';
import { loadBatchFile } from './batch-file.js';

let dir = '';

function write(content: string): string {
  const path = resolve(dir, 'batch.yaml');
  writeFileSync(path, content, 'utf-8');
  return path;
}

beforeEach(() => {
  dir = mkdtempSync(resolve(tmpdir(), 'esgrade-batch-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('loadBatchFile', () => {
  it('expands years into units', () => {
    const batch = loadBatchFile(write(`
themes: [GHG, RD]
units:
  - company: Acme Corp
    ticker: ACME
    cik: "320193"
    years: [2022, 2023]
  - company: Globex
    year: 2023
`));

    expect(batch).toEqual({
      themes: ['GHG', 'RD'],
      units: [
        { company: { name: 'Acme Corp', ticker: 'ACME', cik: '0000320193' }, year: 2022 },
        { company: { name: 'Acme Corp', ticker: 'ACME', cik: '0000320193' }, year: 2023 },
        { company: { name: 'Globex' }, year: 2023 },
      ],
    });
  });

  it('omits themes when the file has none', () => {
    const batch = loadBatchFile(write('units:\n  - company: Globex\n    year: 2021\n'));
    expect(batch).toEqual({ units: [{ company: { name: 'Globex' }, year: 2021 }] });
  });

  it('requires exactly one of year or years', () => {
    const path = write('units:\n  - company: Globex\n    year: 2021\n    years: [2022]\n');

    let caught: unknown;
    try {
      loadBatchFile(path);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({ issues: ['units.0.year: Unit must define exactly one of year or years'] });
  });

  it('rejects an empty unit list', () => {
    expect(() => loadBatchFile(write('units: []\n'))).toThrow('units: Array must contain at least 1 element(s)');
  });

  it('reports a missing file', () => {
    expect(() => loadBatchFile(resolve(dir, 'missing.yaml'))).toThrow(/^Batch file not found/);
  });
});

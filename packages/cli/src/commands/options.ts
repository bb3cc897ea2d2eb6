import { InvalidInput, type CompanyRef, type OutputFormat } from '@esgrade/core';
import { normalizeCik } from '@esgrade/providers';

const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'markdown', 'both'];

export function parseYear(value: string): number {
  const year = Number(value);
  if (!Number.isInteger(year) || year < 1900 || year > 2200) {
    throw new InvalidInput(`Invalid year "${value}"`, 'year');
  }
  return year;
}

/** Comma-separated theme ids; undefined means every rubric theme. */
export function parseThemes(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  const themes = value.split(',').map(t => t.trim()).filter(t => t.length > 0);
  return themes.length > 0 ? themes : undefined;
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

export function parseOutputFormat(value: string | undefined): OutputFormat | undefined {
  if (value === undefined) return undefined;
  if (!isOutputFormat(value)) {
    throw new InvalidInput(`Unknown output format "${value}" (expected ${OUTPUT_FORMATS.join(', ')})`, 'output');
  }
  return value;
}

export function parseIntegerOption(name: string, value: string | undefined, min: number, max = Number.MAX_SAFE_INTEGER): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    throw new InvalidInput(`--${name} must be an integer between ${min} and ${max}, got "${value}"`, name);
  }
  return parsed;
}

export function parseUnitOption(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new InvalidInput(`--${name} must be between 0 and 1, got "${value}"`, name);
  }
  return parsed;
}

export interface CompanyOptions {
  ticker?: string;
  cik?: string;
}

export function buildCompanyRef(name: string, options: CompanyOptions): CompanyRef {
  if (name.trim() === '') {
    throw new InvalidInput('Company name must not be empty', 'company');
  }
  const company: CompanyRef = { name: name.trim() };
  if (options.ticker) company.ticker = options.ticker.toUpperCase();
  if (options.cik !== undefined) {
    const cik = normalizeCik(options.cik);
    if (!cik) throw new InvalidInput(`Invalid CIK "${options.cik}"`, 'cik');
    company.cik = cik;
  }
  return company;
}

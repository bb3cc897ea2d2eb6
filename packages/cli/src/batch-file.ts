import { existsSync, readFileSync } from 'node:fs';
import { parse } from 'yaml';
import { z } from 'zod';
import { ConfigError, type UnitRequest } from '@esgrade/core';

const yearSchema = z.number().int().min(1900).max(2200);

const UnitEntrySchema = z.object({
  company: z.string().min(1),
  ticker: z.string().min(1).optional(),
  cik: z.string().regex(/^\d{1,10}$/, 'Must be 1-10 digits').optional(),
  year: yearSchema.optional(),
  years: z.array(yearSchema).min(1).optional(),
}).strict().superRefine((entry, ctx) => {
  if ((entry.year === undefined) === (entry.years === undefined)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Unit must define exactly one of year or years',
      path: ['year'],
    });
  }
});

const BatchFileSchema = z.object({
  themes: z.array(z.string().min(1)).optional(),
  units: z.array(UnitEntrySchema).min(1),
}).strict();

export interface BatchFile {
  themes?: string[];
  units: UnitRequest[];
}

/**
 * Read a batch definition:
 *
 * ```yaml
 * themes: [GHG, RD]
 * units:
 *   - company: Acme Corp
 *     ticker: ACME
 *     years: [2022, 2023]
 * ```
 */
export function loadBatchFile(filePath: string): BatchFile {
  if (!existsSync(filePath)) {
    throw new ConfigError(`Batch file not found: ${filePath}`);
  }

  let raw: unknown;
  try {
    raw = parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse batch file ${filePath}: ${message}`);
  }

  const parsed = BatchFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid batch file ${filePath}: ${issues.join(', ')}`, issues);
  }

  const units: UnitRequest[] = [];
  for (const entry of parsed.data.units) {
    const company = {
      name: entry.company,
      ...(entry.ticker !== undefined ? { ticker: entry.ticker } : {}),
      ...(entry.cik !== undefined ? { cik: entry.cik.padStart(10, '0') } : {}),
    };
    for (const year of entry.years ?? (entry.year !== undefined ? [entry.year] : [])) {
      units.push({ company, year });
    }
  }

  return { ...(parsed.data.themes ? { themes: parsed.data.themes } : {}), units };
}

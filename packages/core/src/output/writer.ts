import { writeFileSync, mkdirSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import type { BatchOutcome, UnitResult } from '../pipeline/types.js';
import { formatBatchJson, formatUnitJson } from './json.js';
import { formatMarkdown } from './markdown.js';

export type OutputFormat = 'json' | 'markdown' | 'both';

export const DEFAULT_FILENAME_TEMPLATE = '{org}-{year}';

export interface ArtifactWriterOptions {
  outputDir: string;
  format?: OutputFormat;
  /** Per-unit file name; supports {org}, {ticker}, {year}, {date}, {snapshot}. */
  filenameTemplate?: string;
  /** Clock for the summary date; pass the determinism context's `now`. */
  now: () => Date;
  rubricName?: string;
  rubricVersion?: string;
}

export interface WriteOutputResult {
  unitPaths: string[];
  summaryPath?: string;
  markdownPath?: string;
}

type TemplateValue = string | number;

export function substituteVariables(template: string, variables: Record<string, TemplateValue>): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) => {
    const value = variables[name];
    return value === undefined ? match : String(value);
  });
}

export function resolveFilename(template: string, result: UnitResult, now: Date): string {
  const name = substituteVariables(template, {
    org: result.orgId,
    ticker: result.company.ticker ?? result.orgId,
    year: result.year,
    date: now.toISOString().split('T')[0],
    snapshot: result.snapshotId,
  });
  return name.replace(/[^A-Za-z0-9._-]+/g, '-');
}

/**
 * Writes StageScore and ParityReport artifacts: one JSON file per unit plus
 * a batch summary, and a markdown report when the format asks for one.
 */
export class ArtifactWriter {
  private readonly format: OutputFormat;
  private readonly template: string;

  constructor(private readonly options: ArtifactWriterOptions) {
    this.format = options.format ?? 'json';
    this.template = options.filenameTemplate ?? DEFAULT_FILENAME_TEMPLATE;
  }

  get writesJson(): boolean {
    return this.format === 'json' || this.format === 'both';
  }

  get writesMarkdown(): boolean {
    return this.format === 'markdown' || this.format === 'both';
  }

  writeUnit(result: UnitResult): string {
    const path = join(this.options.outputDir, `${resolveFilename(this.template, result, this.options.now())}.json`);
    writeFile(path, formatUnitJson(result));
    return path;
  }

  writeBatch(outcome: BatchOutcome): WriteOutputResult {
    const now = this.options.now();
    const written: WriteOutputResult = { unitPaths: [] };

    if (this.writesJson) {
      for (const result of outcome.results) {
        written.unitPaths.push(this.writeUnit(result));
      }
      written.summaryPath = join(this.options.outputDir, 'batch-summary.json');
      writeFile(written.summaryPath, formatBatchJson(outcome, now));
    }

    if (this.writesMarkdown) {
      written.markdownPath = join(this.options.outputDir, 'summary.md');
      writeFile(written.markdownPath, formatMarkdown({
        outcome,
        generatedAt: now,
        rubricName: this.options.rubricName,
        rubricVersion: this.options.rubricVersion,
      }));
    }

    return written;
  }
}

function writeFile(path: string, content: string): void {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  writeFileSync(path, content, 'utf-8');
}

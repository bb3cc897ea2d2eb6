/**
 * Human-readable batch summary.
 *
 * Produces a markdown report with:
 * - YAML frontmatter (date, rubric, unit and parity counts)
 * - One stage table per unit, with cited quotes
 * - Parity violations and failed units, when present
 */

import type { BatchOutcome, UnitResult } from '../pipeline/types.js';

export interface MarkdownFormatOptions {
  outcome: BatchOutcome;
  /** From the determinism clock. */
  generatedAt: Date;
  rubricName?: string;
  rubricVersion?: string;
}

export function formatMarkdown(options: MarkdownFormatOptions): string {
  const { outcome } = options;
  const lines: string[] = [];

  lines.push(buildFrontmatter(options));
  lines.push('# ESG Maturity Scores');

  for (const result of outcome.results) {
    lines.push('');
    lines.push(buildUnitSection(result));
  }

  const violations = outcome.results.flatMap(r =>
    r.themes.filter(t => t.parity.verdict === 'fail').map(t => ({ key: r.key, theme: t.theme, parity: t.parity })),
  );
  if (violations.length > 0) {
    lines.push('');
    lines.push('## Parity Violations');
    lines.push('');
    for (const v of violations) {
      lines.push(`- **${v.key} ${v.theme}**: missing ${v.parity.missingIds.map(id => `\`${id}\``).join(', ')}`);
    }
  }

  if (outcome.errors.length > 0) {
    lines.push('');
    lines.push('## Failed Units');
    lines.push('');
    lines.push('| Unit | Error | Message |');
    lines.push('|------|-------|---------|');
    for (const record of outcome.errors) {
      lines.push(`| ${record.key} | ${record.error.name} | ${escapeCell(record.error.message)} |`);
    }
  }

  lines.push('');
  return lines.join('\n');
}

function buildFrontmatter(options: MarkdownFormatOptions): string {
  const { outcome } = options;
  const fields: string[] = [];
  fields.push('---');
  fields.push(`date: ${options.generatedAt.toISOString().split('T')[0]}`);
  if (options.rubricName) {
    fields.push(`rubric: ${options.rubricName}${options.rubricVersion ? ` v${options.rubricVersion}` : ''}`);
  }
  fields.push(`units: ${outcome.results.length}`);
  fields.push(`failed_units: ${outcome.errors.length}`);
  fields.push(`parity: ${outcome.parity.passed}/${outcome.parity.total}`);
  fields.push('---');
  fields.push('');
  return fields.join('\n');
}

function buildUnitSection(result: UnitResult): string {
  const lines: string[] = [];
  const ticker = result.company.ticker ? ` (${result.company.ticker})` : '';

  lines.push(`## ${result.company.name}${ticker}, ${result.year}`);
  lines.push('');
  lines.push(`Source: \`${result.source.id}\` via ${result.source.providerId} (tier ${result.source.tier}). Snapshot \`${result.snapshotId}\`.`);
  lines.push('');
  lines.push('| Theme | Stage | Confidence | Evidence | Parity |');
  lines.push('|-------|-------|------------|----------|--------|');
  for (const theme of result.themes) {
    const { score } = theme;
    const stage = score.audit ? `0 (gated from ${score.audit.candidateStage})` : String(score.stage);
    lines.push(
      `| ${theme.theme} | ${stage} | ${score.confidence.toFixed(2)} | ${score.evidenceIds.length} | ${theme.parity.verdict} |`,
    );
  }

  const quotes = result.themes.flatMap(t => {
    const cited = new Set(t.score.evidenceIds);
    return t.evidence.filter(q => cited.has(q.id)).map(q => ({ theme: t.theme, quote: q }));
  });
  if (quotes.length > 0) {
    lines.push('');
    lines.push('### Evidence');
    lines.push('');
    for (const { theme, quote } of quotes) {
      const page = quote.page !== undefined ? `, p. ${quote.page}` : '';
      lines.push(`- **${theme}** "${quote.quote}" (\`${quote.id}\`${page})`);
    }
  }

  return lines.join('\n');
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}

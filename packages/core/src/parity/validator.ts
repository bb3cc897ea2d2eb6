import { ParityViolation } from '../errors.js';

export type ParityVerdict = 'pass' | 'fail';

export interface ParityReport {
  readonly query: string;
  /** Sorted, distinct. */
  readonly evidenceIds: readonly string[];
  /** Sorted, distinct. */
  readonly topKIds: readonly string[];
  readonly verdict: ParityVerdict;
  /** evidenceIds not present in topKIds, sorted. */
  readonly missingIds: readonly string[];
  /** Share of cited ids found in the top-K; 1 when nothing is cited. */
  readonly coverage: number;
}

export interface ParitySummary {
  total: number;
  passed: number;
  failed: number;
  passRate: number;
  failingQueries: string[];
}

/**
 * Check that every cited evidence id was part of the ranked top-K for the
 * same query.
 */
export function check(query: string, evidenceIds: readonly string[], topKIds: readonly string[]): ParityReport {
  const evidence = sortedDistinct(evidenceIds);
  const topK = sortedDistinct(topKIds);
  const inTopK = new Set(topK);
  const missing = evidence.filter(id => !inTopK.has(id));
  const coverage = evidence.length === 0 ? 1 : (evidence.length - missing.length) / evidence.length;
  const verdict: ParityVerdict = missing.length === 0 ? 'pass' : 'fail';

  return Object.freeze({
    query,
    evidenceIds: Object.freeze(evidence),
    topKIds: Object.freeze(topK),
    verdict,
    missingIds: Object.freeze(missing),
    coverage,
  });
}

export function assertParity(report: ParityReport): void {
  if (report.verdict === 'fail') {
    throw new ParityViolation(
      `Evidence not in top-K for "${report.query}": ${report.missingIds.join(', ')}`,
      report.query,
      [...report.missingIds],
    );
  }
}

export function summarize(reports: readonly ParityReport[]): ParitySummary {
  const failing = reports.filter(r => r.verdict === 'fail');
  return {
    total: reports.length,
    passed: reports.length - failing.length,
    failed: failing.length,
    passRate: reports.length === 0 ? 1 : (reports.length - failing.length) / reports.length,
    failingQueries: sortedDistinct(failing.map(r => r.query)),
  };
}

function sortedDistinct(ids: readonly string[]): string[] {
  return [...new Set(ids)].sort();
}

/**
 * Machine-readable artifact serialization.
 *
 * Field names are snake_case; arrays keep the engine's canonical order so two
 * runs over the same inputs produce byte-identical files.
 */

import type { ErrorDetails } from '../errors.js';
import type { ParityReport, ParitySummary } from '../parity/index.js';
import type { BatchOutcome, UnitErrorRecord, UnitResult } from '../pipeline/types.js';
import type { EvidenceQuote, StageAudit, StageScore } from '../scoring/index.js';

export interface StageScoreJson {
  theme: string;
  stage: number;
  confidence: number;
  evidence_ids: string[];
  snapshot_id: string;
  org_id: string;
  year: number;
  audit?: {
    reason: StageAudit['reason'];
    candidate_stage: number;
    required: number;
    found: number;
  };
}

export interface ParityReportJson {
  query: string;
  evidence_ids: string[];
  top_k_ids: string[];
  verdict: ParityReport['verdict'];
  missing_ids: string[];
  coverage: number;
}

export interface EvidenceJson {
  id: string;
  document_id: string;
  quote: string;
  offset: number;
  page?: number;
  published_at?: string;
}

export interface UnitJson {
  key: string;
  company: { name: string; ticker?: string; cik?: string };
  year: number;
  org_id: string;
  snapshot_id: string;
  source: {
    id: string;
    provider_id: string;
    tier: number;
    url?: string;
    content_type: string;
    content_hash: string;
    byte_length: number;
    retrieved_at: string;
  };
  attempts: number;
  span_count: number;
  scores: StageScoreJson[];
  parity: ParityReportJson[];
  evidence: EvidenceJson[];
}

export interface ErrorRecordJson {
  key: string;
  company: string;
  year: number;
  error: { name: string; message: string; details: ErrorDetails };
}

export interface BatchJson {
  generated_at: string;
  units: UnitJson[];
  errors: ErrorRecordJson[];
  parity_summary: {
    total: number;
    passed: number;
    failed: number;
    pass_rate: number;
    failing_queries: string[];
  };
}

export function stageScoreToJson(score: StageScore): StageScoreJson {
  const json: StageScoreJson = {
    theme: score.theme,
    stage: score.stage,
    confidence: score.confidence,
    evidence_ids: [...score.evidenceIds],
    snapshot_id: score.snapshotId,
    org_id: score.orgId,
    year: score.year,
  };
  if (score.audit) {
    json.audit = {
      reason: score.audit.reason,
      candidate_stage: score.audit.candidateStage,
      required: score.audit.required,
      found: score.audit.found,
    };
  }
  return json;
}

export function parityReportToJson(report: ParityReport): ParityReportJson {
  return {
    query: report.query,
    evidence_ids: [...report.evidenceIds],
    top_k_ids: [...report.topKIds],
    verdict: report.verdict,
    missing_ids: [...report.missingIds],
    coverage: report.coverage,
  };
}

function evidenceToJson(quote: EvidenceQuote): EvidenceJson {
  const json: EvidenceJson = {
    id: quote.id,
    document_id: quote.documentId,
    quote: quote.quote,
    offset: quote.offset,
  };
  if (quote.page !== undefined) json.page = quote.page;
  if (quote.publishedAt !== undefined) json.published_at = quote.publishedAt;
  return json;
}

export function unitToJson(result: UnitResult): UnitJson {
  const cited = new Set(result.themes.flatMap(t => t.score.evidenceIds));
  const evidence = result.themes
    .flatMap(t => t.evidence)
    .filter(q => cited.has(q.id))
    .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
    .map(evidenceToJson);

  const { company, source } = result;
  return {
    key: result.key,
    company: {
      name: company.name,
      ...(company.ticker !== undefined ? { ticker: company.ticker } : {}),
      ...(company.cik !== undefined ? { cik: company.cik } : {}),
    },
    year: result.year,
    org_id: result.orgId,
    snapshot_id: result.snapshotId,
    source: {
      id: source.id,
      provider_id: source.providerId,
      tier: source.tier,
      ...(source.url !== undefined ? { url: source.url } : {}),
      content_type: source.contentType,
      content_hash: source.contentHash,
      byte_length: source.byteLength,
      retrieved_at: source.retrievedAt,
    },
    attempts: result.attempts,
    span_count: result.spanCount,
    scores: result.themes.map(t => stageScoreToJson(t.score)),
    parity: result.themes.map(t => parityReportToJson(t.parity)),
    evidence,
  };
}

function errorToJson(record: UnitErrorRecord): ErrorRecordJson {
  return { key: record.key, company: record.company, year: record.year, error: { ...record.error } };
}

function summaryToJson(summary: ParitySummary): BatchJson['parity_summary'] {
  return {
    total: summary.total,
    passed: summary.passed,
    failed: summary.failed,
    pass_rate: summary.passRate,
    failing_queries: [...summary.failingQueries],
  };
}

export function formatUnitJson(result: UnitResult): string {
  return JSON.stringify(unitToJson(result), null, 2);
}

/** `generatedAt` comes from the determinism clock. */
export function formatBatchJson(outcome: BatchOutcome, generatedAt: Date): string {
  const json: BatchJson = {
    generated_at: generatedAt.toISOString(),
    units: outcome.results.map(unitToJson),
    errors: outcome.errors.map(errorToJson),
    parity_summary: summaryToJson(outcome.parity),
  };
  return JSON.stringify(json, null, 2);
}

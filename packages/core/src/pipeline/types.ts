import type { ErrorDetails } from '../errors.js';
import type { ParityReport, ParitySummary } from '../parity/index.js';
import type { RankedResult } from '../ranking/index.js';
import type { CompanyRef } from '../resolver/index.js';
import type { EvidenceQuote, StageScore } from '../scoring/index.js';

/** One (company, year) unit of work. */
export interface UnitRequest {
  company: CompanyRef;
  year: number;
}

export interface ResolvedSource {
  id: string;
  providerId: string;
  tier: number;
  url?: string;
  contentType: string;
  contentHash: string;
  byteLength: number;
  retrievedAt: string;
}

export interface ThemeResult {
  theme: string;
  query: string;
  score: StageScore;
  /** All quotes extracted from the top-K, including ones the score does not cite. */
  evidence: EvidenceQuote[];
  topK: RankedResult[];
  parity: ParityReport;
}

export interface UnitResult {
  key: string;
  company: CompanyRef;
  year: number;
  orgId: string;
  snapshotId: string;
  source: ResolvedSource;
  /** Download attempts before a candidate succeeded. */
  attempts: number;
  spanCount: number;
  /** Sorted by theme id. */
  themes: ThemeResult[];
}

export interface UnitErrorRecord {
  key: string;
  company: string;
  year: number;
  error: {
    name: string;
    message: string;
    details: ErrorDetails;
  };
}

export interface BatchOutcome {
  results: UnitResult[];
  errors: UnitErrorRecord[];
  parity: ParitySummary;
}

export type UnitStage = 'resolve' | 'extract' | 'store' | 'rank' | 'score' | 'validate';

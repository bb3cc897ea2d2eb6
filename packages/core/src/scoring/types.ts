export type StageLevel = 0 | 1 | 2 | 3 | 4;
export type ScoredStage = Exclude<StageLevel, 0>;

export const MIN_QUOTES_DEFAULT = 2;

// ---------------------------------------------------------------------------
// Compiled rubric
// ---------------------------------------------------------------------------

export interface RubricSignal {
  readonly kind: 'pattern' | 'keyword';
  /** The pattern or keyword as written in the rubric. */
  readonly source: string;
  readonly regex: RegExp;
}

export interface RubricStage {
  readonly stage: ScoredStage;
  readonly description: string;
  readonly signals: readonly RubricSignal[];
  /** Distinct evidence items that must match for the stage to be satisfied. */
  readonly minMatches: number;
}

export interface RubricTheme {
  readonly id: string;
  readonly name: string;
  readonly description?: string;
  readonly query: string;
  readonly minQuotes?: number;
  readonly baseline: string;
  /** Ascending by stage. */
  readonly stages: readonly RubricStage[];
}

export interface Rubric {
  readonly version: string;
  readonly name: string;
  readonly minQuotes?: number;
  readonly themes: readonly RubricTheme[];
  /** Canonical hash of the validated definition. */
  readonly fingerprint: string;
}

// ---------------------------------------------------------------------------
// Evidence and scores
// ---------------------------------------------------------------------------

export interface EvidenceQuote {
  readonly id: string;
  /** Ranked document (span) id the quote was taken from. */
  readonly documentId: string;
  /** Verbatim excerpt, at most 30 words. */
  readonly quote: string;
  /** Character offset of the quote inside the span's page. */
  readonly offset: number;
  readonly page?: number;
  readonly theme: string;
  /** SHA-256 of the normalized quote text; equal quotes share a hash. */
  readonly contentHash: string;
  readonly publishedAt?: string;
}

export interface StageAudit {
  reason: 'insufficient_evidence';
  /** Stage the patterns supported before the evidence gate. */
  candidateStage: ScoredStage;
  required: number;
  found: number;
}

export interface StageScore {
  theme: string;
  stage: StageLevel;
  confidence: number;
  evidenceIds: string[];
  orgId: string;
  year: number;
  snapshotId: string;
  audit?: StageAudit;
}

export function isScoredStage(value: number): value is ScoredStage {
  return value === 1 || value === 2 || value === 3 || value === 4;
}

import type { DeterminismContext } from '../determinism/index.js';
import { InvalidInput } from '../errors.js';
import type { RankCandidate, RankedResult } from '../ranking/ranker.js';
import { extractEvidence, type EvidenceExtractionOptions } from './evidence.js';
import { DEFAULT_FRESHNESS_POLICY, ageInMonths, freshnessPenalty, type FreshnessPolicy } from './freshness.js';
import { findTheme } from './loader.js';
import {
  MIN_QUOTES_DEFAULT,
  type EvidenceQuote,
  type Rubric,
  type RubricStage,
  type RubricTheme,
  type StageScore,
} from './types.js';

const SPECIFICITY_BASE = 0.4;
const SPECIFICITY_RANGE = 0.6;

export interface RubricScorerOptions {
  rubric: Rubric;
  determinism: DeterminismContext;
  /** Fallback when neither theme nor rubric sets min_quotes (default: 2). */
  minQuotes?: number;
  freshness?: FreshnessPolicy;
  extraction?: EvidenceExtractionOptions;
}

interface StageMatch {
  stage: RubricStage;
  supporting: EvidenceQuote[];
  matchedSignals: number;
}

/**
 * Rubric-driven stage classification with an evidence-count gate.
 *
 * Pure: the only outside input is the determinism clock, used for
 * evidence freshness.
 */
export class RubricScorer {
  readonly rubric: Rubric;
  private readonly determinism: DeterminismContext;
  private readonly minQuotes: number;
  private readonly freshness: FreshnessPolicy;
  private readonly extraction: EvidenceExtractionOptions;

  constructor(options: RubricScorerOptions) {
    const minQuotes = options.minQuotes ?? MIN_QUOTES_DEFAULT;
    if (!Number.isInteger(minQuotes) || minQuotes < 1) {
      throw new InvalidInput(`minQuotes must be a positive integer, got ${minQuotes}`, 'minQuotes');
    }
    this.rubric = options.rubric;
    this.determinism = options.determinism;
    this.minQuotes = minQuotes;
    this.freshness = options.freshness ?? DEFAULT_FRESHNESS_POLICY;
    this.extraction = options.extraction ?? {};
  }

  theme(themeId: string): RubricTheme {
    return findTheme(this.rubric, themeId);
  }

  /** Theme override, then rubric, then scorer default. */
  minQuotesFor(theme: RubricTheme): number {
    return theme.minQuotes ?? this.rubric.minQuotes ?? this.minQuotes;
  }

  extractEvidence(themeId: string, ranked: readonly RankedResult[], candidates: readonly RankCandidate[]): EvidenceQuote[] {
    return extractEvidence(this.theme(themeId), ranked, candidates, this.extraction);
  }

  score(
    themeId: string,
    evidence: readonly EvidenceQuote[],
    orgId: string,
    year: number,
    snapshotId: string,
  ): StageScore {
    const theme = this.theme(themeId);
    const items = distinctEvidence(evidence.filter(q => q.theme === theme.id));
    const base = { theme: theme.id, orgId, year, snapshotId };

    let best: StageMatch | undefined;
    for (const stage of theme.stages) {
      const match = matchStage(stage, items);
      if (match.supporting.length >= stage.minMatches) {
        best = match;
      }
    }

    if (!best) {
      return { ...base, stage: 0, confidence: 0, evidenceIds: [] };
    }

    const required = this.minQuotesFor(theme);
    if (best.supporting.length < required) {
      return {
        ...base,
        stage: 0,
        confidence: 0,
        evidenceIds: [],
        audit: {
          reason: 'insufficient_evidence',
          candidateStage: best.stage.stage,
          required,
          found: best.supporting.length,
        },
      };
    }

    return {
      ...base,
      stage: best.stage.stage,
      confidence: this.confidence(best),
      evidenceIds: best.supporting.map(q => q.id).sort(),
    };
  }

  /** Pattern specificity less the mean freshness penalty, floored at 0. */
  private confidence(match: StageMatch): number {
    const totalSignals = match.stage.signals.length;
    const specificity = SPECIFICITY_BASE + SPECIFICITY_RANGE * (match.matchedSignals / totalSignals);

    const now = this.determinism.now();
    const penalties = match.supporting.map(q => freshnessPenalty(ageInMonths(q.publishedAt, now), this.freshness));
    const meanPenalty = penalties.reduce((sum, p) => sum + p, 0) / penalties.length;

    const value = Math.min(1, Math.max(0, specificity - meanPenalty));
    return Math.round(value * 10_000) / 10_000;
  }
}

function matchStage(stage: RubricStage, items: readonly EvidenceQuote[]): StageMatch {
  const supporting = items.filter(q => stage.signals.some(signal => signal.regex.test(q.quote)));
  const matchedSignals = stage.signals.filter(signal => supporting.some(q => signal.regex.test(q.quote))).length;
  return { stage, supporting, matchedSignals };
}

/** First occurrence of each content hash, ordered by evidence id. */
function distinctEvidence(evidence: readonly EvidenceQuote[]): EvidenceQuote[] {
  const ordered = [...evidence].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  const seen = new Set<string>();
  return ordered.filter(q => {
    if (seen.has(q.contentHash)) return false;
    seen.add(q.contentHash);
    return true;
  });
}

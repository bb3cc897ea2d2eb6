import { InvalidInput } from '../errors.js';
import type { SemanticScorer } from './semantic.js';

export type MetadataValue = string | number | boolean;

/** A unit of rankable text with its precomputed lexical signal. */
export interface RankCandidate {
  readonly documentId: string;
  readonly text: string;
  readonly lexicalScore: number;
  readonly metadata?: Readonly<Record<string, MetadataValue>>;
}

export interface RankedResult {
  readonly documentId: string;
  readonly lexicalScore: number;
  readonly semanticScore: number;
  readonly fusedScore: number;
  /** 0-based position in the output. */
  readonly rank: number;
}

/**
 * Total order over ranked results: fused, lexical and semantic scores
 * descending, then document id ascending by code unit.
 */
export function compareRanked(
  a: Omit<RankedResult, 'rank'>,
  b: Omit<RankedResult, 'rank'>,
): number {
  return (
    b.fusedScore - a.fusedScore ||
    b.lexicalScore - a.lexicalScore ||
    b.semanticScore - a.semanticScore ||
    (a.documentId < b.documentId ? -1 : a.documentId > b.documentId ? 1 : 0)
  );
}

/**
 * Fuses a supplied lexical score with a pluggable semantic score.
 *
 * The semantic model may change; normalization (clamp to [0, 1]), the
 * weighted fusion and the tie-break order do not. Fusion is monotonic in
 * both inputs.
 */
export class HybridRanker {
  constructor(private readonly semantic: SemanticScorer) {}

  get semanticModel(): string {
    return this.semantic.name;
  }

  rank(query: string, candidates: readonly RankCandidate[], alpha: number, k: number): RankedResult[] {
    if (candidates.length === 0) {
      throw new InvalidInput('no candidates', 'candidates');
    }
    if (!Number.isFinite(alpha) || alpha < 0 || alpha > 1) {
      throw new InvalidInput(`alpha must be within [0, 1], got ${alpha}`, 'alpha');
    }
    if (!Number.isInteger(k) || k < 0) {
      throw new InvalidInput(`k must be a non-negative integer, got ${k}`, 'k');
    }

    const seen = new Set<string>();
    const scored = candidates.map((candidate, index) => {
      if (seen.has(candidate.documentId)) {
        throw new InvalidInput(`duplicate document id: ${candidate.documentId}`, 'documentId');
      }
      seen.add(candidate.documentId);

      const semanticRaw = this.semantic.score(query, candidate.text, index);
      if (!Number.isFinite(candidate.lexicalScore) || !Number.isFinite(semanticRaw)) {
        throw new InvalidInput('nan/inf score', candidate.documentId);
      }

      const lexicalScore = clampUnit(candidate.lexicalScore);
      const semanticScore = clampUnit(semanticRaw);
      return {
        documentId: candidate.documentId,
        lexicalScore,
        semanticScore,
        fusedScore: alpha * lexicalScore + (1 - alpha) * semanticScore,
      };
    });

    return scored
      .sort(compareRanked)
      .slice(0, k)
      .map((result, rank) => Object.freeze({ ...result, rank }));
  }
}

function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value));
}

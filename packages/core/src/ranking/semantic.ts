import { stableHash, stableHash64 } from '../determinism/index.js';
import { tokenize, tokenSet } from './tokenize.js';

/**
 * Relevance of `text` to `query` in [0, 1]. `index` is the candidate's
 * position in the ranker input and may be used for reproducible tie-breaking.
 */
export interface SemanticScorer {
  readonly name: string;
  score(query: string, text: string, index: number): number;
}

export type SemanticScorerKind = 'token_overlap' | 'hashed_embedding';

// ---------------------------------------------------------------------------
// Token overlap (Jaccard) with hash-derived micro-perturbation
// ---------------------------------------------------------------------------

const PERTURBATION_BUCKETS = 1000;
const PERTURBATION_SCALE = 1e-6;

export class TokenOverlapScorer implements SemanticScorer {
  readonly name = 'token_overlap';

  constructor(private readonly seed: bigint) {}

  score(query: string, text: string, index: number): number {
    const q = tokenSet(query);
    const d = tokenSet(text);
    let shared = 0;
    for (const token of q) {
      if (d.has(token)) shared++;
    }
    const union = q.size + d.size - shared;
    const jaccard = union === 0 ? 0 : shared / union;
    return Math.min(1, jaccard + this.perturbation(query, index));
  }

  /** Value in [0, 0.001) fixed by seed, query and position. */
  perturbation(query: string, index: number): number {
    const bucket = parseInt(stableHash(`${this.seed}:${query}:${index}`).slice(0, 8), 16) % PERTURBATION_BUCKETS;
    return bucket * PERTURBATION_SCALE;
  }
}

// ---------------------------------------------------------------------------
// Hashed term-frequency embedding with cosine similarity
// ---------------------------------------------------------------------------

export class HashedEmbeddingScorer implements SemanticScorer {
  readonly name = 'hashed_embedding';

  constructor(
    private readonly seed: bigint,
    private readonly dimension = 256,
  ) {
    if (!Number.isInteger(dimension) || dimension < 1) {
      throw new RangeError('dimension must be a positive integer');
    }
  }

  score(query: string, text: string): number {
    const a = this.embed(query);
    const b = this.embed(text);
    let dot = 0;
    for (let i = 0; i < this.dimension; i++) {
      dot += a[i] * b[i];
    }
    return Math.min(1, Math.max(0, dot));
  }

  /** L2-normalized hashed TF vector; all zeros for empty text. */
  embed(text: string): Float64Array {
    const vector = new Float64Array(this.dimension);
    const size = BigInt(this.dimension);
    for (const token of tokenize(text)) {
      vector[Number(stableHash64(`${this.seed}:${token}`) % size)] += 1;
    }
    let norm = 0;
    for (const value of vector) norm += value * value;
    if (norm > 0) {
      const scale = 1 / Math.sqrt(norm);
      for (let i = 0; i < vector.length; i++) vector[i] *= scale;
    }
    return vector;
  }
}

export function createSemanticScorer(kind: SemanticScorerKind, seed: bigint): SemanticScorer {
  switch (kind) {
    case 'hashed_embedding':
      return new HashedEmbeddingScorer(seed);
    case 'token_overlap':
      return new TokenOverlapScorer(seed);
  }
}

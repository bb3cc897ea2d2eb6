export { tokenize, tokenSet } from './tokenize.js';
export { Bm25Scorer, type Bm25Params } from './bm25.js';
export {
  TokenOverlapScorer,
  HashedEmbeddingScorer,
  createSemanticScorer,
  type SemanticScorer,
  type SemanticScorerKind,
} from './semantic.js';
export { HybridRanker, compareRanked, type RankCandidate, type RankedResult, type MetadataValue } from './ranker.js';
export { buildRankPool } from './pool.js';

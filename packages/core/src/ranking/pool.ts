import type { TextSpan } from '../extraction/types.js';
import { Bm25Scorer, type Bm25Params } from './bm25.js';
import type { MetadataValue, RankCandidate } from './ranker.js';

/**
 * Turn stored spans into rank candidates, scoring each against `query`
 * with BM25 over the span collection.
 */
export function buildRankPool(query: string, spans: readonly TextSpan[], params?: Bm25Params): RankCandidate[] {
  const bm25 = new Bm25Scorer(spans.map(span => span.text), params);
  const scores = bm25.scores(query);

  return spans.map((span, i) => {
    const metadata: Record<string, MetadataValue> = {
      sourceId: span.sourceId,
      offset: span.offset,
    };
    if (span.page !== undefined) metadata.page = span.page;
    if (span.publishedAt !== undefined) metadata.publishedAt = span.publishedAt;

    return Object.freeze({
      documentId: span.id,
      text: span.text,
      lexicalScore: scores[i],
      metadata: Object.freeze(metadata),
    });
  });
}

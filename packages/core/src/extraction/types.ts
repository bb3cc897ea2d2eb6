import type { ResolvedDocument } from '../resolver/types.js';

/**
 * A contiguous slice of extracted document text. `id` is the identifier used
 * for ranking and parity; `offset` is the character offset of the slice
 * within its page of extracted text.
 */
export interface TextSpan {
  readonly id: string;
  /** Id of the resolved document the span came from. */
  readonly sourceId: string;
  readonly text: string;
  readonly offset: number;
  /** 1-based page number when the text carries page breaks. */
  readonly page?: number;
  /** ISO date the source was published, when known. */
  readonly publishedAt?: string;
}

export interface TextExtractor {
  extract(document: ResolvedDocument): TextSpan[];
}

export function spanId(sourceId: string, page: number | undefined, offset: number): string {
  return page === undefined ? `${sourceId}#${offset}` : `${sourceId}#p${page}:${offset}`;
}

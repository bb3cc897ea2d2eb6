import { tokenize } from './tokenize.js';

export interface Bm25Params {
  /** Term frequency saturation (default: 1.2). */
  k1?: number;
  /** Length normalization (default: 0.75). */
  b?: number;
}

/**
 * Okapi BM25 over a fixed corpus. Scores are squashed to [0, 1) with
 * x / (x + 1) so they can be fed to the hybrid ranker as lexical signals.
 */
export class Bm25Scorer {
  private readonly docs: Array<Map<string, number>>;
  private readonly lengths: number[];
  private readonly avgLength: number;
  private readonly docFreq = new Map<string, number>();
  private readonly k1: number;
  private readonly b: number;

  constructor(texts: readonly string[], params: Bm25Params = {}) {
    this.k1 = params.k1 ?? 1.2;
    this.b = params.b ?? 0.75;
    this.docs = texts.map(text => termCounts(tokenize(text)));
    this.lengths = texts.map((_, i) => sumCounts(this.docs[i]));
    const total = this.lengths.reduce((sum, n) => sum + n, 0);
    this.avgLength = texts.length > 0 ? total / texts.length : 0;

    for (const doc of this.docs) {
      for (const term of doc.keys()) {
        this.docFreq.set(term, (this.docFreq.get(term) ?? 0) + 1);
      }
    }
  }

  get size(): number {
    return this.docs.length;
  }

  /** Normalized score per corpus document, in corpus order. */
  scores(query: string): number[] {
    // Sorted unique terms keep the floating-point summation order fixed
    const terms = [...new Set(tokenize(query))].sort();
    const n = this.docs.length;

    return this.docs.map((doc, i) => {
      if (this.avgLength === 0) return 0;
      let raw = 0;
      for (const term of terms) {
        const tf = doc.get(term);
        if (!tf) continue;
        const df = this.docFreq.get(term) ?? 0;
        const idf = Math.log((n - df + 0.5) / (df + 0.5) + 1);
        const norm = 1 - this.b + this.b * (this.lengths[i] / this.avgLength);
        raw += idf * (tf * (this.k1 + 1)) / (tf + this.k1 * norm);
      }
      return raw / (raw + 1);
    });
  }
}

function termCounts(tokens: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

function sumCounts(counts: Map<string, number>): number {
  let total = 0;
  for (const value of counts.values()) total += value;
  return total;
}

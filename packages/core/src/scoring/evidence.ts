import { stableHash } from '../determinism/index.js';
import type { RankCandidate, RankedResult } from '../ranking/ranker.js';
import type { EvidenceQuote, RubricSignal, RubricTheme } from './types.js';

export interface EvidenceExtractionOptions {
  /** Maximum words per quote (default: 30). */
  maxWords?: number;
  /** Quotes kept per ranked document (default: 3). */
  maxQuotesPerDocument?: number;
}

// A period followed by a non-space (2.5%, U.S.) does not end a sentence
const SENTENCE = /(?:[^.!?\n]|[.!?](?=\S))+[.!?]*/g;
const WORD = /\S+/g;
const LEAD_WORDS = 5;

/**
 * Pull verbatim quotes that match any of the theme's stage signals out of
 * the ranked documents, in rank order. Quotes with equal normalized text are
 * kept once.
 */
export function extractEvidence(
  theme: RubricTheme,
  ranked: readonly RankedResult[],
  candidates: readonly RankCandidate[],
  options: EvidenceExtractionOptions = {},
): EvidenceQuote[] {
  const maxWords = options.maxWords ?? 30;
  const perDocument = options.maxQuotesPerDocument ?? 3;
  const signals = theme.stages.flatMap(stage => stage.signals);
  const byId = new Map(candidates.map(c => [c.documentId, c]));
  const seen = new Set<string>();
  const quotes: EvidenceQuote[] = [];

  for (const result of ranked) {
    const candidate = byId.get(result.documentId);
    if (!candidate) continue;

    const base = numberMeta(candidate, 'offset') ?? 0;
    const page = numberMeta(candidate, 'page');
    const publishedAt = stringMeta(candidate, 'publishedAt');
    let taken = 0;

    for (const sentence of candidate.text.matchAll(SENTENCE)) {
      if (taken >= perDocument) break;
      if (sentence.index === undefined) continue;

      const window = quoteWindow(sentence[0], signals, maxWords);
      if (!window) continue;

      const contentHash = stableHash(normalizeQuote(window.text));
      if (seen.has(contentHash)) continue;
      seen.add(contentHash);

      const offset = base + sentence.index + window.start;
      quotes.push(Object.freeze({
        id: `ev_${stableHash(`${candidate.documentId}:${offset}:${window.text}`).slice(0, 12)}`,
        documentId: candidate.documentId,
        quote: window.text,
        offset,
        ...(page !== undefined ? { page } : {}),
        theme: theme.id,
        contentHash,
        ...(publishedAt !== undefined ? { publishedAt } : {}),
      }));
      taken++;
    }
  }

  return quotes;
}

export function normalizeQuote(text: string): string {
  return text.toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Verbatim window of at most `maxWords` words around the first signal match,
 * or undefined when no signal matches the sentence.
 */
function quoteWindow(
  sentence: string,
  signals: readonly RubricSignal[],
  maxWords: number,
): { start: number; text: string } | undefined {
  let first = -1;
  for (const signal of signals) {
    const match = signal.regex.exec(sentence);
    if (match && (first === -1 || match.index < first)) {
      first = match.index;
    }
  }
  if (first === -1) return undefined;

  const words = [...sentence.matchAll(WORD)].map(m => {
    const start = m.index ?? 0;
    return { start, end: start + m[0].length };
  });
  if (words.length === 0) return undefined;

  let anchor = words.findIndex(w => w.end > first);
  if (anchor === -1) anchor = words.length - 1;
  const from = words.length <= maxWords ? 0 : Math.max(0, Math.min(anchor - LEAD_WORDS, words.length - maxWords));
  const to = Math.min(words.length, from + maxWords) - 1;

  const start = words[from].start;
  return { start, text: sentence.slice(start, words[to].end) };
}

function numberMeta(candidate: RankCandidate, key: string): number | undefined {
  const value = candidate.metadata?.[key];
  return typeof value === 'number' ? value : undefined;
}

function stringMeta(candidate: RankCandidate, key: string): string | undefined {
  const value = candidate.metadata?.[key];
  return typeof value === 'string' ? value : undefined;
}

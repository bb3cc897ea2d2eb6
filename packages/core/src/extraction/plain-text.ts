import { ExtractionError } from '../errors.js';
import type { ResolvedDocument } from '../resolver/types.js';
import { spanId, type TextExtractor, type TextSpan } from './types.js';

export interface PlainTextExtractorOptions {
  /** Upper bound for a span; paragraphs are never split (default: 1200). */
  maxSpanChars?: number;
}

const PARAGRAPH = /(?:[^\n]|\n(?![ \t]*(?:\n|$)))+/g;

const ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

/**
 * Extracts paragraph-aligned spans from text, HTML and JSON documents.
 * Form feeds separate pages. Binary formats such as PDF need a dedicated
 * extractor and are rejected.
 */
export class PlainTextExtractor implements TextExtractor {
  private readonly maxSpanChars: number;

  constructor(options: PlainTextExtractorOptions = {}) {
    this.maxSpanChars = options.maxSpanChars ?? 1200;
  }

  extract(document: ResolvedDocument): TextSpan[] {
    const text = this.toText(document);
    const pages = text.split('\f');
    const paged = pages.length > 1;
    const publishedAt = document.candidate.attributes?.['publishedAt'];
    const spans: TextSpan[] = [];

    pages.forEach((pageText, pageIndex) => {
      const page = paged ? pageIndex + 1 : undefined;
      for (const [start, end] of this.chunk(pageText)) {
        spans.push(Object.freeze({
          id: spanId(document.id, page, start),
          sourceId: document.id,
          text: pageText.slice(start, end),
          offset: start,
          ...(page !== undefined ? { page } : {}),
          ...(publishedAt !== undefined ? { publishedAt } : {}),
        }));
      }
    });

    return spans;
  }

  private toText(document: ResolvedDocument): string {
    const contentType = document.candidate.contentType.toLowerCase().split(';')[0].trim();
    const raw = new TextDecoder('utf-8').decode(document.bytes);

    switch (contentType) {
      case 'text/plain':
      case 'text/markdown':
        return raw.replace(/\r\n?/g, '\n');
      case 'text/html':
      case 'application/xhtml+xml':
        return htmlToText(raw);
      case 'application/json':
        return jsonToText(raw, document);
      default:
        throw new ExtractionError(
          `No text extractor for content type "${document.candidate.contentType}"`,
          document.id,
          document.candidate.contentType,
        );
    }
  }

  /** Group paragraphs into [start, end) ranges no longer than maxSpanChars. */
  private chunk(pageText: string): Array<[number, number]> {
    const ranges: Array<[number, number]> = [];
    let current: [number, number] | undefined;

    for (const match of pageText.matchAll(PARAGRAPH)) {
      const body = match[0];
      const lead = body.length - body.trimStart().length;
      const trimmed = body.trim();
      if (trimmed.length === 0 || match.index === undefined) continue;

      const start = match.index + lead;
      const end = start + trimmed.length;

      if (current && end - current[0] <= this.maxSpanChars) {
        current[1] = end;
      } else {
        if (current) ranges.push(current);
        current = [start, end];
      }
    }

    if (current) ranges.push(current);
    return ranges;
  }
}

export function htmlToText(html: string): string {
  return html
    .replace(/<(script|style|noscript)[^>]*>[\s\S]*?<\/\1>/gi, '')
    .replace(/<!--[\s\S]*?-->/g, '')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/(p|div|h[1-6]|li|tr|table|section|article)>/gi, '\n\n')
    .replace(/<[^>]+>/g, ' ')
    .replace(/&(#\d+|#x[0-9a-f]+|[a-z]+);/gi, (entity, name: string) => decodeEntity(entity, name))
    .split('\n')
    .map(line => line.replace(/[ \t\u00a0]+/g, ' ').trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

function decodeEntity(entity: string, name: string): string {
  if (name.startsWith('#x') || name.startsWith('#X')) {
    return fromCodePoint(parseInt(name.slice(2), 16));
  }
  if (name.startsWith('#')) {
    return fromCodePoint(parseInt(name.slice(1), 10));
  }
  return ENTITIES[name.toLowerCase()] ?? entity;
}

/** Out-of-range and surrogate code points decode to U+FFFD. */
function fromCodePoint(code: number): string {
  if (!Number.isInteger(code) || code < 0 || code > 0x10ffff || (code >= 0xd800 && code <= 0xdfff)) {
    return '\uFFFD';
  }
  return String.fromCodePoint(code);
}

function jsonToText(raw: string, document: ResolvedDocument): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ExtractionError('Document is not valid JSON', document.id, document.candidate.contentType);
  }
  const strings: string[] = [];
  collectStrings(parsed, strings);
  return strings.join('\n\n');
}

function collectStrings(value: unknown, out: string[]): void {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed.length > 0) out.push(trimmed.replace(/\s*\n\s*/g, ' '));
    return;
  }
  if (Array.isArray(value)) {
    for (const item of value) collectStrings(item, out);
    return;
  }
  if (value !== null && typeof value === 'object') {
    for (const key of Object.keys(value).sort()) {
      collectStrings(Reflect.get(value, key), out);
    }
  }
}

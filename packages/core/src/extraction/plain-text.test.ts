import { describe, it, expect } from 'vitest';
import { PlainTextExtractor, htmlToText } from './plain-text.js';
import { createResolvedDocument, createSourceCandidate, type ResolvedDocument } from '../resolver/types.js';
import { ExtractionError } from '../errors.js';

function doc(text: string, contentType = 'text/plain', attributes?: Record<string, string>): ResolvedDocument {
  const candidate = createSourceCandidate({
    providerId: 'local',
    tier: 1,
    priorityScore: 10,
    access: 'file',
    contentType,
    ...(attributes ? { attributes } : {}),
  });
  return createResolvedDocument(candidate, new TextEncoder().encode(text), new Date('2024-01-01T00:00:00Z'));
}

describe('PlainTextExtractor', () => {
  const text = 'First paragraph line one.\nline two.\n\nSecond paragraph.';

  it('merges paragraphs up to the span limit', () => {
    const document = doc(text);
    const spans = new PlainTextExtractor().extract(document);
    expect(spans).toHaveLength(1);
    expect(spans[0].id).toBe(`${document.id}#0`);
    expect(spans[0].text).toBe(text);
  });

  it('starts a new span when the next paragraph would exceed the limit', () => {
    const document = doc(text);
    const spans = new PlainTextExtractor({ maxSpanChars: 40 }).extract(document);
    expect(spans.map(s => [s.id, s.offset, s.text])).toEqual([
      [`${document.id}#0`, 0, 'First paragraph line one.\nline two.'],
      [`${document.id}#37`, 37, 'Second paragraph.'],
    ]);
    expect(spans.every(s => s.sourceId === document.id)).toBe(true);
  });

  it('numbers pages separated by form feeds', () => {
    const document = doc('Page one.\fPage two.');
    const spans = new PlainTextExtractor().extract(document);
    expect(spans.map(s => [s.id, s.page, s.text])).toEqual([
      [`${document.id}#p1:0`, 1, 'Page one.'],
      [`${document.id}#p2:0`, 2, 'Page two.'],
    ]);
  });

  it('carries the publication date onto every span', () => {
    const spans = new PlainTextExtractor({ maxSpanChars: 40 }).extract(doc(text, 'text/plain', { publishedAt: '2023-03-01' }));
    expect(spans.map(s => s.publishedAt)).toEqual(['2023-03-01', '2023-03-01']);
  });

  it('collects JSON strings in key order', () => {
    const spans = new PlainTextExtractor({ maxSpanChars: 3 }).extract(
      doc(JSON.stringify({ b: 'beta', a: ['alpha', 1] }), 'application/json; charset=utf-8'),
    );
    expect(spans.map(s => s.text)).toEqual(['alpha', 'beta']);
  });

  it('rejects malformed JSON', () => {
    expect(() => new PlainTextExtractor().extract(doc('{not json', 'application/json'))).toThrow(ExtractionError);
  });

  it('rejects binary content types', () => {
    const document = doc('%PDF-1.7', 'application/pdf');
    expect(() => new PlainTextExtractor().extract(document)).toThrow(
      'No text extractor for content type "application/pdf"',
    );
  });
});

describe('htmlToText', () => {
  it('drops scripts and tags and decodes entities', () => {
    const html = '<html><body><p>Hello &amp; welcome</p><script>track()</script><p>Second</p></body></html>';
    expect(htmlToText(html)).toBe('Hello & welcome\n\nSecond');
  });

  it('decodes numeric entities', () => {
    expect(htmlToText('<p>CO&#8322; &#x2013; 5%</p>')).toBe('CO₂ – 5%');
  });

  it('replaces code points outside Unicode with U+FFFD', () => {
    expect(htmlToText('<p>Scope 1 &#x110000; emissions fell</p>')).toBe('Scope 1 \uFFFD emissions fell');
    expect(htmlToText('<p>&#99999999; and &#xD800;</p>')).toBe('\uFFFD and \uFFFD');
  });
});

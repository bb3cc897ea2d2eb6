export { spanId, type TextSpan, type TextExtractor } from './types.js';
export { PlainTextExtractor, htmlToText, type PlainTextExtractorOptions } from './plain-text.js';

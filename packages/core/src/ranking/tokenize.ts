const WORD = /[\p{L}\p{N}_]+/gu;

/** Lowercased word tokens in document order. */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(WORD) ?? [];
}

export function tokenSet(text: string): Set<string> {
  return new Set(tokenize(text));
}

import type { DeterminismContext } from '@esgrade/core';
import type { FetchRetryConfig } from './retry.js';

export const DEFAULT_USER_AGENT = 'esgrade/0.1 (contact@example.com)';

/** Shared runtime passed to every provider at construction. */
export interface ProviderContext {
  determinism: DeterminismContext;
  /** Sent on every HTTP request; SEC requires a contact address. */
  userAgent: string;
  retry: FetchRetryConfig;
}

export interface ProviderContextOptions {
  userAgent?: string;
  retry?: Omit<FetchRetryConfig, 'random'>;
}

/**
 * Build the provider runtime. In deterministic mode backoff jitter comes
 * from the run seed so retry timing does not depend on ambient state.
 */
export function createProviderContext(
  determinism: DeterminismContext,
  options: ProviderContextOptions = {},
): ProviderContext {
  const random = determinism.deterministic ? seededJitter(determinism) : Math.random;
  return {
    determinism,
    userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
    retry: { ...options.retry, random },
  };
}

function seededJitter(determinism: DeterminismContext): () => number {
  const rng = determinism.rng('http-jitter');
  return () => rng.next();
}

/** Common constructor options of every built-in provider. */
export interface BaseProviderOptions {
  enabled?: boolean;
  /** Added to each candidate's priority score, clamped to 0..100. */
  priorityOffset?: number;
}

export function applyPriorityOffset(base: number, offset = 0): number {
  return Math.min(100, Math.max(0, base + offset));
}

const CONTENT_TYPES: Record<string, string> = {
  json: 'application/json',
  htm: 'text/html',
  html: 'text/html',
  xhtml: 'text/html',
  txt: 'text/plain',
  md: 'text/markdown',
  pdf: 'application/pdf',
};

/** Content type from a path or URL extension, `undefined` when unknown. */
export function contentTypeFor(pathOrUrl: string): string | undefined {
  const path = pathOrUrl.split(/[?#]/)[0];
  const match = /\.([A-Za-z0-9]+)$/.exec(path);
  return match ? CONTENT_TYPES[match[1].toLowerCase()] : undefined;
}

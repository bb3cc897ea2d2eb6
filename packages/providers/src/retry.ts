/**
 * HTTP fetch with retry for report providers.
 *
 * Retries on 429 (rate limit), 5xx and network failures with exponential
 * backoff. Respects Retry-After headers, a per-request timeout and the
 * caller's abort signal. Jitter comes from an injectable source so a seeded
 * run backs off on the same schedule every time.
 */

export interface FetchRetryConfig {
  /** Maximum retry attempts (default: 2). */
  maxRetries?: number;
  /** Initial delay in ms before first retry (default: 1000). */
  initialDelayMs?: number;
  /** Backoff multiplier (default: 2). */
  backoffMultiplier?: number;
  /** Maximum delay cap in ms (default: 15000). */
  maxDelayMs?: number;
  /** Per-attempt timeout in ms (default: 30000). */
  timeoutMs?: number;
  /** Uniform source in [0, 1) for backoff jitter (default: Math.random). */
  random?: () => number;
}

const DEFAULT_CONFIG = {
  maxRetries: 2,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 15000,
  timeoutMs: 30000,
};

class RetryableHttpError extends Error {
  constructor(message: string, public readonly retryAfterMs: number | undefined) {
    super(message);
    this.name = 'RetryableHttpError';
  }
}

/**
 * Fetch with automatic retry on rate limits, server errors and timeouts.
 * Returns the successful Response or throws after all retries exhausted.
 * Aborts from the caller's signal are rethrown immediately.
 */
export async function fetchWithRetry(
  url: string,
  init: RequestInit,
  config: FetchRetryConfig = {},
): Promise<Response> {
  const {
    maxRetries = DEFAULT_CONFIG.maxRetries,
    initialDelayMs = DEFAULT_CONFIG.initialDelayMs,
    backoffMultiplier = DEFAULT_CONFIG.backoffMultiplier,
    maxDelayMs = DEFAULT_CONFIG.maxDelayMs,
    timeoutMs = DEFAULT_CONFIG.timeoutMs,
    random = Math.random,
  } = config;
  const signal = init.signal ?? undefined;

  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    let retryAfterMs: number | undefined;
    try {
      const response = await fetchOnce(url, init, timeoutMs, signal);

      if (response.ok) {
        return response;
      }

      const status = response.status;
      const message = `HTTP ${status} ${response.statusText}` +
        (status === 429 ? ' (rate limited)' : '') +
        ` for ${url}`;

      if (status !== 429 && (status < 500 || status > 599)) {
        throw new Error(message);
      }
      throw new RetryableHttpError(message, parseRetryAfter(response.headers.get('Retry-After')));
    } catch (err) {
      if (isAbortError(err) && signal?.aborted) {
        throw err;
      }

      lastError = err instanceof Error ? err : new Error(String(err));
      if (lastError instanceof RetryableHttpError) {
        retryAfterMs = lastError.retryAfterMs;
      } else if (!isNetworkError(lastError)) {
        throw lastError;
      }

      if (attempt >= maxRetries) {
        throw lastError;
      }
    }

    const baseDelay = initialDelayMs * Math.pow(backoffMultiplier, attempt);
    const jitter = baseDelay * 0.1 * random();
    let delay = Math.min(baseDelay + jitter, maxDelayMs);
    if (retryAfterMs !== undefined) {
      delay = Math.max(delay, retryAfterMs);
    }

    await sleep(delay, signal);
  }

  throw lastError ?? new Error('Fetch retry failed');
}

async function fetchOnce(
  url: string,
  init: RequestInit,
  timeoutMs: number,
  signal: AbortSignal | undefined,
): Promise<Response> {
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onAbort = () => controller.abort();
  if (signal?.aborted) controller.abort();
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } catch (err) {
    if (timedOut) {
      throw new Error(`Request timeout after ${timeoutMs}ms for ${url}`, { cause: err });
    }
    throw err;
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onAbort);
  }
}

function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined;
  const seconds = parseInt(value, 10);
  return isNaN(seconds) ? undefined : seconds * 1000;
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

function isNetworkError(error: Error): boolean {
  return error.message.includes('fetch failed') ||
    error.message.includes('ECONNRESET') ||
    error.message.includes('ETIMEDOUT') ||
    error.message.includes('timeout');
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new DOMException('Aborted', 'AbortError'));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new DOMException('Aborted', 'AbortError'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

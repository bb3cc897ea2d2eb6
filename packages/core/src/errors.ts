// ---------------------------------------------------------------------------
// Engine error taxonomy
// ---------------------------------------------------------------------------

export type ErrorDetails = Record<string, string | number | boolean | string[] | null>;

/** Process cannot start: missing or invalid rubric, config, or determinism settings. */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'ConfigError';
  }

  details(): ErrorDetails {
    return { issues: this.issues };
  }
}

/** Caller-supplied data violates a precondition. */
export class InvalidInput extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'InvalidInput';
  }

  details(): ErrorDetails {
    return { field: this.field ?? null };
  }
}

export type ProviderOperation = 'search' | 'download';

/** A single provider failed. Absorbed by search, recorded by download fallback. */
export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly providerId: string,
    public readonly operation: ProviderOperation,
    public readonly timedOut = false,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ProviderError';
  }

  details(): ErrorDetails {
    return { providerId: this.providerId, operation: this.operation, timedOut: this.timedOut };
  }
}

/** No usable document after exhausting every candidate. */
export class ResolutionFailed extends Error {
  constructor(
    message: string,
    public readonly company: string,
    public readonly year: number,
    public readonly attempts: number,
    public readonly lastError?: Error,
  ) {
    super(message, lastError ? { cause: lastError } : undefined);
    this.name = 'ResolutionFailed';
  }

  details(): ErrorDetails {
    return {
      company: this.company,
      year: this.year,
      attempts: this.attempts,
      lastError: this.lastError?.message ?? null,
    };
  }
}

/** Resolved bytes could not be turned into text spans. */
export class ExtractionError extends Error {
  constructor(
    message: string,
    public readonly documentId: string,
    public readonly contentType: string,
  ) {
    super(message);
    this.name = 'ExtractionError';
  }

  details(): ErrorDetails {
    return { documentId: this.documentId, contentType: this.contentType };
  }
}

/** Evidence cited by scoring is not contained in the ranked top-K. */
export class ParityViolation extends Error {
  constructor(
    message: string,
    public readonly query: string,
    public readonly missingIds: string[],
  ) {
    super(message);
    this.name = 'ParityViolation';
  }

  details(): ErrorDetails {
    return { query: this.query, missingIds: this.missingIds };
  }
}

/** A persisted store file exists but cannot be read back. Fails the unit that reads it. */
export class StorageError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'StorageError';
  }

  details(): ErrorDetails {
    return { path: this.path, issues: this.issues };
  }
}

export class CancelledError extends Error {
  constructor(message = 'Unit cancelled') {
    super(message);
    this.name = 'CancelledError';
  }

  details(): ErrorDetails {
    return {};
  }
}

export type EngineError =
  | ConfigError
  | InvalidInput
  | ProviderError
  | ResolutionFailed
  | ExtractionError
  | ParityViolation
  | StorageError
  | CancelledError;

export function isEngineError(error: unknown): error is EngineError {
  return (
    error instanceof ConfigError ||
    error instanceof InvalidInput ||
    error instanceof ProviderError ||
    error instanceof ResolutionFailed ||
    error instanceof ExtractionError ||
    error instanceof ParityViolation ||
    error instanceof StorageError ||
    error instanceof CancelledError
  );
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/** Throw a CancelledError when the signal has fired. */
export function throwIfAborted(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new CancelledError(`Cancelled before ${stage}`);
  }
}

import { EventEmitter } from 'eventemitter3';
import {
  CancelledError,
  ConfigError,
  ProviderError,
  ResolutionFailed,
  throwIfAborted,
  toError,
  type ProviderOperation,
} from '../errors.js';
import { callWithTimeout } from './timeout.js';
import {
  createSourceCandidate,
  isSourceTier,
  type CompanyRef,
  type DownloadFailure,
  type ReportProvider,
  type Resolution,
  type ResolvedDocument,
  type SourceCandidate,
  type SourceTier,
} from './types.js';

// ---------------------------------------------------------------------------
// Resolver event types
// ---------------------------------------------------------------------------

export type ResolverState = 'searching' | 'prioritizing' | 'downloading' | 'resolved' | 'exhausted';

export interface ResolverStateEvent {
  state: ResolverState;
  company: string;
  year: number;
  /** 1-based download attempt, set while downloading. */
  attempt?: number;
}

export interface ProviderResultsEvent {
  providerId: string;
  tier: SourceTier;
  count: number;
}

export interface ProviderErrorEvent {
  providerId: string;
  tier: SourceTier;
  error: ProviderError;
}

export interface ProviderSkippedEvent {
  providerId: string;
  tier: SourceTier;
}

export interface DownloadAttemptEvent {
  candidate: SourceCandidate;
  attempt: number;
  total: number;
}

export interface DownloadFailedEvent {
  candidate: SourceCandidate;
  attempt: number;
  error: Error;
}

export interface DownloadResolvedEvent {
  document: ResolvedDocument;
  attempt: number;
}

export interface ResolverEvents {
  'resolver:state': (event: ResolverStateEvent) => void;
  'provider:results': (event: ProviderResultsEvent) => void;
  'provider:error': (event: ProviderErrorEvent) => void;
  'provider:skipped': (event: ProviderSkippedEvent) => void;
  'download:attempt': (event: DownloadAttemptEvent) => void;
  'download:failed': (event: DownloadFailedEvent) => void;
  'download:resolved': (event: DownloadResolvedEvent) => void;
}

export interface CandidateResolverOptions {
  /** Providers grouped by tier; index 0 is tier 1. At most three tiers. */
  tiers: ReadonlyArray<ReadonlyArray<ReportProvider>>;
  /** Per-call limit for search and download (default: 30000). */
  providerTimeoutMs?: number;
}

export const DEFAULT_PROVIDER_TIMEOUT_MS = 30_000;

// ---------------------------------------------------------------------------
// CandidateResolver
// ---------------------------------------------------------------------------

/**
 * Multi-tier report resolution with priority-ordered download fallback.
 *
 * Search is fail-open per provider: errors and timeouts are reported through
 * `provider:error` and contribute no candidates. Download is fail-closed: the
 * first successful candidate wins, and exhausting the list throws
 * `ResolutionFailed`.
 */
export class CandidateResolver extends EventEmitter<ResolverEvents> {
  private readonly tiers: ReadonlyArray<ReadonlyArray<ReportProvider>>;
  private readonly providers = new Map<string, ReportProvider>();
  private readonly timeoutMs: number;

  constructor(options: CandidateResolverOptions) {
    super();
    if (options.tiers.length > 3) {
      throw new ConfigError(`At most 3 provider tiers are supported, got ${options.tiers.length}`);
    }
    for (const provider of options.tiers.flat()) {
      if (this.providers.has(provider.id)) {
        throw new ConfigError(`Provider "${provider.id}" is registered more than once`);
      }
      this.providers.set(provider.id, provider);
    }
    this.tiers = options.tiers;
    this.timeoutMs = options.providerTimeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
  }

  get providerCount(): number {
    return this.providers.size;
  }

  get tierCount(): number {
    return this.tiers.length;
  }

  /**
   * Query every enabled provider. Providers within a tier run concurrently;
   * results are concatenated in tier order, then provider order.
   */
  async search(company: CompanyRef, year: number, signal?: AbortSignal): Promise<SourceCandidate[]> {
    const results: SourceCandidate[] = [];

    for (let index = 0; index < this.tiers.length; index++) {
      throwIfAborted(signal, 'search');
      const tier = index + 1;
      if (!isSourceTier(tier)) break;

      const batches = await Promise.all(
        this.tiers[index].map(provider => this.searchProvider(provider, company, year, tier, signal)),
      );
      for (const batch of batches) {
        results.push(...batch);
      }
    }

    throwIfAborted(signal, 'prioritize');
    return results;
  }

  /** Stable sort by (tier asc, priorityScore asc). Returns a new array. */
  prioritize(candidates: readonly SourceCandidate[]): SourceCandidate[] {
    return [...candidates].sort((a, b) => a.tier - b.tier || a.priorityScore - b.priorityScore);
  }

  async resolveBest(company: CompanyRef, year: number, signal?: AbortSignal): Promise<Resolution> {
    this.setState('searching', company, year);
    const found = await this.search(company, year, signal);

    this.setState('prioritizing', company, year);
    const ordered = this.prioritize(found);

    if (ordered.length === 0) {
      this.setState('exhausted', company, year);
      throw new ResolutionFailed(
        `No report candidates found for ${company.name} (${year}). ` +
        `Searched ${this.providerCount} providers across ${this.tierCount} tiers`,
        company.name,
        year,
        0,
      );
    }

    const failures: DownloadFailure[] = [];

    for (let i = 0; i < ordered.length; i++) {
      throwIfAborted(signal, 'download');
      const candidate = ordered[i];
      const attempt = i + 1;
      this.setState('downloading', company, year, attempt);
      this.emit('download:attempt', { candidate, attempt, total: ordered.length });

      try {
        const document = await this.downloadCandidate(candidate, signal);
        this.emit('download:resolved', { document, attempt });
        this.setState('resolved', company, year, attempt);
        return { document, attempts: attempt, failures };
      } catch (err) {
        if (signal?.aborted) {
          throw new CancelledError('Cancelled during download');
        }
        const error = toError(err);
        failures.push({ candidate, error });
        this.emit('download:failed', { candidate, attempt, error });
      }
    }

    this.setState('exhausted', company, year);
    const lastError = failures[failures.length - 1]?.error;
    throw new ResolutionFailed(
      `Failed to download report for ${company.name} (${year}) after trying ${ordered.length} candidates. ` +
      `Last error: ${lastError?.message ?? 'unknown'}`,
      company.name,
      year,
      ordered.length,
      lastError,
    );
  }

  private async searchProvider(
    provider: ReportProvider,
    company: CompanyRef,
    year: number,
    tier: SourceTier,
    signal: AbortSignal | undefined,
  ): Promise<SourceCandidate[]> {
    if (provider.enabled === false) {
      this.emit('provider:skipped', { providerId: provider.id, tier });
      return [];
    }

    try {
      const candidates = await callWithTimeout(
        inner => provider.search(company, year, tier, inner),
        this.timeoutMs,
        () => timeoutError(provider.id, 'search', this.timeoutMs),
        signal,
      );
      const accepted = candidates.map(candidate => normalizeCandidate(candidate, provider.id, tier));
      this.emit('provider:results', { providerId: provider.id, tier, count: accepted.length });
      return accepted;
    } catch (err) {
      if (signal?.aborted) {
        throw new CancelledError('Cancelled during search');
      }
      const error = asProviderError(err, provider.id, 'search');
      this.emit('provider:error', { providerId: provider.id, tier, error });
      return [];
    }
  }

  private downloadCandidate(candidate: SourceCandidate, signal: AbortSignal | undefined): Promise<ResolvedDocument> {
    const provider = this.providers.get(candidate.providerId);
    if (!provider) {
      return Promise.reject(
        new ProviderError(`Provider not registered: ${candidate.providerId}`, candidate.providerId, 'download'),
      );
    }
    return callWithTimeout(
      inner => provider.download(candidate, inner),
      this.timeoutMs,
      () => timeoutError(provider.id, 'download', this.timeoutMs),
      signal,
    );
  }

  private setState(state: ResolverState, company: CompanyRef, year: number, attempt?: number): void {
    this.emit('resolver:state', { state, company: company.name, year, attempt });
  }
}

function timeoutError(providerId: string, operation: ProviderOperation, timeoutMs: number): ProviderError {
  return new ProviderError(`${providerId} ${operation} timed out after ${timeoutMs}ms`, providerId, operation, true);
}

/** Re-validate a provider result; it must carry the provider's id and the tier being scanned. */
function normalizeCandidate(candidate: SourceCandidate, providerId: string, tier: SourceTier): SourceCandidate {
  let normalized: SourceCandidate;
  try {
    normalized = createSourceCandidate({ ...candidate });
  } catch (err) {
    const reason = toError(err).message;
    throw new ProviderError(`${providerId} search returned an invalid candidate: ${reason}`, providerId, 'search');
  }
  if (normalized.providerId !== providerId) {
    throw new ProviderError(
      `${providerId} search returned a candidate for provider "${normalized.providerId}"`,
      providerId,
      'search',
    );
  }
  if (normalized.tier !== tier) {
    throw new ProviderError(
      `${providerId} search returned a tier ${normalized.tier} candidate while scanning tier ${tier}`,
      providerId,
      'search',
    );
  }
  return normalized;
}

function asProviderError(err: unknown, providerId: string, operation: ProviderOperation): ProviderError {
  if (err instanceof ProviderError) return err;
  const error = toError(err);
  return new ProviderError(`${providerId} ${operation} failed: ${error.message}`, providerId, operation, false, {
    cause: error,
  });
}

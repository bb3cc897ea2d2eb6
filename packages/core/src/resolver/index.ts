export {
  createSourceCandidate,
  createResolvedDocument,
  companySlug,
  isSourceTier,
  type SourceCandidate,
  type SourceCandidateInput,
  type SourceTier,
  type AccessMethod,
  type CompanyRef,
  type ResolvedDocument,
  type ReportProvider,
  type DownloadFailure,
  type Resolution,
} from './types.js';
export {
  CandidateResolver,
  DEFAULT_PROVIDER_TIMEOUT_MS,
  type CandidateResolverOptions,
  type ResolverEvents,
  type ResolverState,
  type ResolverStateEvent,
  type ProviderResultsEvent,
  type ProviderErrorEvent,
  type ProviderSkippedEvent,
  type DownloadAttemptEvent,
  type DownloadFailedEvent,
  type DownloadResolvedEvent,
} from './resolver.js';
export { callWithTimeout } from './timeout.js';

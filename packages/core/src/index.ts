// Errors
export {
  ConfigError,
  InvalidInput,
  ProviderError,
  ResolutionFailed,
  ExtractionError,
  ParityViolation,
  StorageError,
  CancelledError,
  isEngineError,
  toError,
  throwIfAborted,
  type EngineError,
  type ErrorDetails,
  type ProviderOperation,
} from './errors.js';

// Determinism
export * from './determinism/index.js';

// Resolution
export * from './resolver/index.js';

// Extraction
export * from './extraction/index.js';

// Ranking
export * from './ranking/index.js';

// Scoring
export * from './scoring/index.js';

// Parity
export * from './parity/index.js';

// Storage
export * from './storage/index.js';

// Pipeline
export * from './pipeline/index.js';

// Output
export * from './output/index.js';

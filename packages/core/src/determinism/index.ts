export { HASH_VERSION, stableHash, stableHash64, hashToUnit, canonicalJson, canonicalHash, type JsonValue } from './hash.js';
export { SeededRng, seededRng } from './rng.js';
export { systemClock, fixedClock, type Clock } from './clock.js';
export {
  DEFAULT_SEED,
  createDeterminismContext,
  readDeterminismEnv,
  deriveSnapshotId,
  type DeterminismContext,
  type DeterminismSettings,
} from './context.js';

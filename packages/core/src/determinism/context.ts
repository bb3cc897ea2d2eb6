import { ConfigError } from '../errors.js';
import { fixedClock, systemClock, type Clock } from './clock.js';
import { canonicalHash, type JsonValue } from './hash.js';
import { SeededRng } from './rng.js';

export const DEFAULT_SEED = 42n;
const MAX_SEED = 2n ** 64n - 1n;

export interface DeterminismSettings {
  /** When true, both fixedTime and seed are mandatory. */
  enabled: boolean;
  /** Unix seconds returned by the clock in deterministic mode. */
  fixedTime?: number;
  seed?: bigint | number | string;
}

/**
 * Read-only run configuration shared by every unit of work. Established once
 * at process start and passed explicitly to each component.
 */
export interface DeterminismContext {
  readonly deterministic: boolean;
  readonly seed: bigint;
  readonly fixedTime: number | undefined;
  now(): Date;
  clockSeconds(): number;
  rng(label?: string): SeededRng;
}

export function createDeterminismContext(settings: DeterminismSettings): DeterminismContext {
  const seed = settings.seed === undefined ? undefined : parseSeed(settings.seed);
  const fixedTime = settings.fixedTime;

  if (fixedTime !== undefined && (!Number.isFinite(fixedTime) || fixedTime < 0)) {
    throw new ConfigError(`Invalid fixed time: ${fixedTime}`, ['determinism.fixed_time']);
  }

  if (settings.enabled) {
    const missing: string[] = [];
    if (fixedTime === undefined) missing.push('determinism.fixed_time');
    if (seed === undefined) missing.push('determinism.seed');
    if (missing.length > 0) {
      throw new ConfigError(
        `Deterministic mode requires ${missing.join(' and ')} (or FIXED_TIME / SEED in the environment)`,
        missing,
      );
    }
  }

  const clock: Clock = settings.enabled && fixedTime !== undefined ? fixedClock(fixedTime) : systemClock;
  const resolvedSeed = seed ?? DEFAULT_SEED;

  return Object.freeze({
    deterministic: settings.enabled,
    seed: resolvedSeed,
    fixedTime: settings.enabled ? fixedTime : undefined,
    now: () => clock.now(),
    clockSeconds: () => clock.seconds(),
    rng: (label?: string) => new SeededRng(resolvedSeed, label),
  });
}

/**
 * Environment fallbacks: ESGRADE_DETERMINISTIC, FIXED_TIME (unix seconds), SEED.
 * Only keys that are present are returned.
 */
export function readDeterminismEnv(env: NodeJS.ProcessEnv = process.env): Partial<DeterminismSettings> {
  const result: Partial<DeterminismSettings> = {};

  const flag = env['ESGRADE_DETERMINISTIC'];
  if (flag !== undefined && flag !== '') {
    result.enabled = flag === '1' || flag.toLowerCase() === 'true';
  }

  const fixedTime = env['FIXED_TIME'];
  if (fixedTime !== undefined && fixedTime !== '') {
    const parsed = Number(fixedTime);
    if (!Number.isFinite(parsed)) {
      throw new ConfigError(`FIXED_TIME must be unix seconds, got "${fixedTime}"`, ['FIXED_TIME']);
    }
    result.fixedTime = parsed;
  }

  const seed = env['SEED'];
  if (seed !== undefined && seed !== '') {
    result.seed = parseSeed(seed);
  }

  return result;
}

/** Run identifier derived from the canonical input parameters. */
export function deriveSnapshotId(params: JsonValue): string {
  return `snap_${canonicalHash(params).slice(0, 16)}`;
}

function parseSeed(value: bigint | number | string): bigint {
  let parsed: bigint;
  if (typeof value === 'bigint') {
    parsed = value;
  } else if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) {
      throw new ConfigError(`Seed must be an integer, got ${value}`, ['determinism.seed']);
    }
    parsed = BigInt(value);
  } else {
    if (!/^\d+$/.test(value.trim())) {
      throw new ConfigError(`Seed must be a non-negative integer, got "${value}"`, ['determinism.seed']);
    }
    parsed = BigInt(value.trim());
  }
  if (parsed < 0n || parsed > MAX_SEED) {
    throw new ConfigError(`Seed out of range: ${parsed}`, ['determinism.seed']);
  }
  return parsed;
}

import { readFileSync, existsSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { resolve } from 'node:path';
import { isMap, parse, parseDocument, stringify } from 'yaml';
import { ConfigError, readDeterminismEnv } from '@esgrade/core';
import { ConfigSchema, ConfigDefaults, type RawConfig, type Config } from './schema.js';

const DEFAULT_CONFIG_PATH = '.esgrade/config.yaml';

function getDefaultConfigPath(): string {
  return resolve(homedir(), DEFAULT_CONFIG_PATH);
}

export function expandTilde(path: string): string {
  if (path.startsWith('~/') || path === '~') {
    return resolve(homedir(), path.slice(2));
  }
  return path;
}

function resolveEnvVar(value: string): string {
  if (value.startsWith('env:')) {
    const envVal = process.env[value.slice(4)];
    return envVal ? envVal : value;
  }
  if (value.startsWith('${') && value.endsWith('}')) {
    const envVal = process.env[value.slice(2, -1)];
    return envVal ? envVal : value;
  }
  if (value.startsWith('$')) {
    const envVal = process.env[value.slice(1)];
    return envVal ? envVal : value;
  }
  return value;
}

function isUnresolvedEnvRef(value: string | undefined): boolean {
  if (!value) return false;
  return value.startsWith('env:') || value.startsWith('$');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stripNullValues(obj: unknown): unknown {
  if (obj === null || obj === undefined) {
    return undefined;
  }
  if (Array.isArray(obj)) {
    return obj.filter(item => item !== null).map(stripNullValues);
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (value !== null) {
        result[key] = stripNullValues(value);
      }
    }
    return result;
  }
  return obj;
}

function resolveEnvVarsInObject(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return resolveEnvVar(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(resolveEnvVarsInObject);
  }
  if (isRecord(obj)) {
    const resolved: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      resolved[key] = resolveEnvVarsInObject(value);
    }
    return resolved;
  }
  return obj;
}

function formatIssues(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): string[] {
  return issues.map(i => `${i.path.join('.')}: ${i.message}`);
}

function cloneDefaults(): Config {
  return structuredClone(ConfigDefaults);
}

export interface LoadConfigOptions {
  configPath?: string;
}

export interface LoadConfigResult {
  config: Config;
  configFileExists: boolean;
  /** Environment variables the settings were read from. */
  envKeysUsed: string[];
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  return loadConfigWithMeta(options).config;
}

export function loadConfigWithMeta(options: LoadConfigOptions = {}): LoadConfigResult {
  const configPath = getConfigPath(options.configPath);
  const configFileExists = existsSync(configPath);
  const result = cloneDefaults();
  const envKeysUsed = applyDeterminismEnv(result);

  if (configFileExists) {
    const raw = readRawConfig(configPath);
    if (raw !== undefined) {
      const validated = ConfigSchema.safeParse(resolveEnvVarsInObject(stripNullValues(raw)));
      if (!validated.success) {
        const issues = formatIssues(validated.error.issues);
        throw new ConfigError(`Invalid config: ${issues.join(', ')}`, issues);
      }
      mergeConfig(result, validated.data);
    }
  }

  envKeysUsed.push(...applyEnvVarFallbacks(result));
  return { config: result, configFileExists, envKeysUsed };
}

function readRawConfig(configPath: string): unknown {
  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch {
    throw new ConfigError(`Failed to read config file: ${configPath}`);
  }

  try {
    return parse(fileContent) ?? undefined;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to parse config file: ${configPath}: ${message}`);
  }
}

function mergeConfig(result: Config, data: RawConfig): void {
  if (data.determinism) {
    const { seed, ...rest } = data.determinism;
    result.determinism = { ...result.determinism, ...rest };
    if (seed !== undefined) result.determinism.seed = String(seed);
  }
  if (data.ranking) {
    const { bm25, ...rest } = data.ranking;
    result.ranking = { ...result.ranking, ...rest, bm25: { ...result.ranking.bm25, ...bm25 } };
  }
  if (data.scoring) {
    result.scoring = { ...result.scoring, ...data.scoring };
  }
  if (data.resolution) {
    result.resolution = { ...result.resolution, ...data.resolution };
  }
  if (data.providers) {
    // A providers section replaces the default provider set
    result.providers = data.providers;
  }
  if (data.storage) {
    result.storage = { ...result.storage, ...data.storage };
  }
  if (data.output) {
    result.output = { ...result.output, ...data.output };
  }
}

/**
 * Determinism settings from ESGRADE_DETERMINISTIC, FIXED_TIME and SEED,
 * applied to the defaults so the config file still wins.
 */
function applyDeterminismEnv(config: Config): string[] {
  const used: string[] = [];
  const env = readDeterminismEnv(process.env);
  if (env.enabled !== undefined) {
    config.determinism.enabled = env.enabled;
    used.push('ESGRADE_DETERMINISTIC');
  }
  if (env.fixedTime !== undefined) {
    config.determinism.fixed_time = env.fixedTime;
    used.push('FIXED_TIME');
  }
  if (env.seed !== undefined) {
    config.determinism.seed = String(env.seed);
    used.push('SEED');
  }
  return used;
}

/** ESGRADE_USER_AGENT fills an unset or unresolved `resolution.user_agent`. */
function applyEnvVarFallbacks(config: Config): string[] {
  if (isUnresolvedEnvRef(config.resolution.user_agent)) {
    config.resolution.user_agent = undefined;
  }
  const envAgent = process.env['ESGRADE_USER_AGENT'];
  if (!config.resolution.user_agent && envAgent) {
    config.resolution.user_agent = envAgent;
    return ['ESGRADE_USER_AGENT'];
  }
  return [];
}

export function getConfigPath(configPath?: string): string {
  if (configPath) {
    return expandTilde(configPath);
  }
  return getDefaultConfigPath();
}

function coerceValue(value: string): string | number | boolean {
  const numValue = Number(value);
  if (!isNaN(numValue) && value.trim() !== '') return numValue;
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}

/**
 * Set a dot-notation key in the config file, keeping its comments.
 * The edited file must still validate.
 */
export function setConfigValue(key: string, value: string, options: LoadConfigOptions = {}): void {
  const configPath = getConfigPath(options.configPath);

  if (!existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}. Run 'esgrade config init' first.`);
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch {
    throw new ConfigError(`Failed to read config file: ${configPath}`);
  }

  const doc = parseDocument(fileContent);
  if (doc.errors.length > 0) {
    throw new ConfigError(`Failed to parse config file: ${configPath}`);
  }
  if (doc.contents !== null && !isMap(doc.contents)) {
    throw new ConfigError(`Config file must contain a mapping: ${configPath}`);
  }

  const path = key.split('.');
  if (path.some(segment => segment === '')) {
    throw new ConfigError(`Invalid config key: ${key}`);
  }
  doc.setIn(path, coerceValue(value));

  const validated = ConfigSchema.safeParse(stripNullValues(doc.toJS()));
  if (!validated.success) {
    const issues = formatIssues(validated.error.issues);
    throw new ConfigError(`Invalid config after setting ${key}: ${issues.join(', ')}`, issues);
  }

  writeFileSync(configPath, doc.toString(), 'utf-8');
}

/** Effective configuration as YAML, for `config show`. */
export function formatConfig(config: Config): string {
  return stringify(config);
}

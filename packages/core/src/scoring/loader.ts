import { existsSync, readFileSync } from 'node:fs';
import { dirname, extname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import { ConfigError } from '../errors.js';
import { canonicalHash } from '../determinism/index.js';
import { RubricSchema, type RawRubric } from './schema.js';
import {
  isScoredStage,
  type Rubric,
  type RubricSignal,
  type RubricStage,
  type RubricTheme,
} from './types.js';

export const DEFAULT_RUBRIC_FILE = 'esg-maturity-v3.yaml';

/** Bundled rubric directory, for both source and tsc output layouts. */
export function getBuiltInRubricsDir(): string {
  const thisDir = dirname(fileURLToPath(import.meta.url));

  // src/scoring/loader.ts -> ../../rubrics
  const sourcePath = resolve(thisDir, '..', '..', 'rubrics');
  if (existsSync(sourcePath)) return sourcePath;

  // dist/core/src/scoring/loader.js -> packages/core/rubrics
  return resolve(thisDir, '..', '..', '..', '..', 'packages', 'core', 'rubrics');
}

export function defaultRubricPath(): string {
  return resolve(getBuiltInRubricsDir(), DEFAULT_RUBRIC_FILE);
}

// ---------------------------------------------------------------------------
// loadRubric: read YAML or JSON, validate, compile
// ---------------------------------------------------------------------------

export function loadRubric(filePath: string): Rubric {
  if (!existsSync(filePath)) {
    throw new ConfigError(`Rubric not found: ${filePath}`);
  }

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch {
    throw new ConfigError(`Failed to read rubric: ${filePath}`);
  }

  let raw: unknown;
  try {
    raw = extname(filePath).toLowerCase() === '.json' ? JSON.parse(content) : parseYaml(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse rubric ${filePath}: ${message}`);
  }

  return parseRubric(raw, filePath);
}

export function parseRubric(raw: unknown, source = '<inline>'): Rubric {
  if (raw === null || raw === undefined) {
    throw new ConfigError(`Rubric is empty: ${source}`);
  }

  const validated = RubricSchema.safeParse(raw);
  if (!validated.success) {
    const issues = validated.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid rubric ${source}: ${issues.join(', ')}`, issues);
  }

  return compileRubric(validated.data);
}

function compileRubric(raw: RawRubric): Rubric {
  const themes: RubricTheme[] = raw.themes.map(theme => {
    const stages: RubricStage[] = theme.stages.map(stage => {
      if (!isScoredStage(stage.stage)) {
        throw new ConfigError(`Theme "${theme.id}": invalid stage ${stage.stage}`);
      }
      const signals: RubricSignal[] = [
        ...stage.patterns.map(source => ({ kind: 'pattern' as const, source, regex: new RegExp(source, 'i') })),
        ...stage.keywords.map(source => ({ kind: 'keyword' as const, source, regex: keywordRegex(source) })),
      ];
      return Object.freeze({
        stage: stage.stage,
        description: stage.description,
        signals: Object.freeze(signals),
        minMatches: stage.min_matches,
      });
    });

    return Object.freeze({
      id: theme.id,
      name: theme.name,
      description: theme.description,
      query: theme.query ?? theme.name,
      minQuotes: theme.min_quotes,
      baseline: theme.stage_0 ?? 'No evidence',
      stages: Object.freeze(stages),
    });
  });

  return Object.freeze({
    version: raw.version,
    name: raw.name,
    minQuotes: raw.min_quotes,
    themes: Object.freeze(themes),
    fingerprint: canonicalHash(raw),
  });
}

/** Case-insensitive whole-word match; inner whitespace matches any run of whitespace. */
export function keywordRegex(keyword: string): RegExp {
  const escaped = keyword
    .trim()
    .replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
    .replace(/\s+/g, '\\s+');
  return new RegExp(`(?<![\\p{L}\\p{N}_])${escaped}(?![\\p{L}\\p{N}_])`, 'iu');
}

export function findTheme(rubric: Rubric, themeId: string): RubricTheme {
  const theme = rubric.themes.find(t => t.id === themeId);
  if (!theme) {
    const known = rubric.themes.map(t => t.id).join(', ');
    throw new ConfigError(`Unknown theme "${themeId}" in rubric ${rubric.name}. Known themes: ${known}`);
  }
  return theme;
}

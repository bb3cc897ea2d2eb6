import {
  ArtifactWriter,
  CandidateResolver,
  ConfigError,
  FileDocumentStore,
  HybridRanker,
  PlainTextExtractor,
  RubricScorer,
  ScoringEngine,
  createDeterminismContext,
  createSemanticScorer,
  defaultRubricPath,
  loadRubric,
  type DeterminismContext,
  type DocumentStore,
  type OutputFormat,
  type ReportProvider,
  type Rubric,
} from '@esgrade/core';
import { buildProviderTiers, createProviderContext, type ProvidersConfig } from '@esgrade/providers';
import { expandTilde, type Config } from './config/index.js';
import type { GlobalOptions } from './context.js';

export interface RuntimeOverrides {
  deterministic?: boolean;
  fixedTime?: number;
  seed?: string;
}

/** Everything a command needs to score, assembled once from config. */
export interface Runtime {
  config: Config;
  determinism: DeterminismContext;
  rubric: Rubric;
  scorer: RubricScorer;
  ranker: HybridRanker;
  store: DocumentStore;
  extractor: PlainTextExtractor;
  resolver: CandidateResolver;
  engine: ScoringEngine;
}

export interface RuntimeOptions {
  /** Replaces the configured providers. */
  tiers?: ReportProvider[][];
}

/** Determinism flags from the global options; `--fixed-time` must be unix seconds. */
export function overridesFromOptions(options: GlobalOptions): RuntimeOverrides {
  const overrides: RuntimeOverrides = {};
  if (options.deterministic) overrides.deterministic = true;
  if (options.fixedTime !== undefined) {
    const parsed = Number(options.fixedTime);
    if (!Number.isInteger(parsed) || parsed < 0) {
      throw new ConfigError(`--fixed-time must be unix seconds, got "${options.fixedTime}"`, ['--fixed-time']);
    }
    overrides.fixedTime = parsed;
  }
  if (options.seed !== undefined) overrides.seed = options.seed;
  return overrides;
}

export function createDeterminism(config: Config, overrides: RuntimeOverrides = {}): DeterminismContext {
  return createDeterminismContext({
    enabled: overrides.deterministic ?? config.determinism.enabled,
    fixedTime: overrides.fixedTime ?? config.determinism.fixed_time,
    seed: overrides.seed ?? config.determinism.seed,
  });
}

export function resolveRubricPath(config: Config, path?: string): string {
  if (path) return expandTilde(path);
  return config.scoring.rubric_path ? expandTilde(config.scoring.rubric_path) : defaultRubricPath();
}

function expandProviderPaths(providers: ProvidersConfig): ProvidersConfig {
  if (!providers.local) return providers;
  return { ...providers, local: { ...providers.local, root: expandTilde(providers.local.root) } };
}

export function createRuntime(config: Config, overrides: RuntimeOverrides = {}, options: RuntimeOptions = {}): Runtime {
  const determinism = createDeterminism(config, overrides);
  const rubric = loadRubric(resolveRubricPath(config));

  const scorer = new RubricScorer({
    rubric,
    determinism,
    minQuotes: config.scoring.min_quotes,
    freshness: { thresholds: config.scoring.freshness },
    extraction: {
      maxWords: config.scoring.max_quote_words,
      maxQuotesPerDocument: config.scoring.max_quotes_per_document,
    },
  });
  const ranker = new HybridRanker(createSemanticScorer(config.ranking.semantic, determinism.seed));

  const providerContext = createProviderContext(determinism, {
    userAgent: config.resolution.user_agent,
    retry: {
      maxRetries: config.resolution.max_retries,
      timeoutMs: config.resolution.provider_timeout_ms,
    },
  });
  const resolver = new CandidateResolver({
    tiers: options.tiers ?? buildProviderTiers(expandProviderPaths(config.providers), providerContext),
    providerTimeoutMs: config.resolution.provider_timeout_ms,
  });

  const store = new FileDocumentStore(expandTilde(config.storage.data_dir));
  const extractor = new PlainTextExtractor();

  const engine = new ScoringEngine({
    resolver,
    extractor,
    store,
    ranker,
    scorer,
    determinism,
    alpha: config.ranking.alpha,
    topK: config.ranking.top_k,
    bm25: config.ranking.bm25,
    strictParity: config.scoring.strict_parity,
  });

  return { config, determinism, rubric, scorer, ranker, store, extractor, resolver, engine };
}

export interface WriterOverrides {
  outputDir?: string;
  format?: OutputFormat;
}

export function createWriter(runtime: Runtime, overrides: WriterOverrides = {}): ArtifactWriter {
  const { config, determinism, rubric } = runtime;
  return new ArtifactWriter({
    outputDir: expandTilde(overrides.outputDir ?? config.output.dir),
    format: overrides.format ?? config.output.format,
    filenameTemplate: config.output.filename_template,
    now: () => determinism.now(),
    rubricName: rubric.name,
    rubricVersion: rubric.version,
  });
}

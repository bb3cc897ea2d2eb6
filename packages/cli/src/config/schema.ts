import { z } from 'zod';
import type { FreshnessThreshold, OutputFormat, SemanticScorerKind } from '@esgrade/core';
import { ProvidersConfigSchema, type ProvidersConfig } from '@esgrade/providers';

const seedSchema = z.union([
  z.number().int().nonnegative(),
  z.string().regex(/^\d+$/, 'Must be a non-negative integer'),
]);

const determinismSchema = z.object({
  enabled: z.boolean().optional(),
  /** Unix seconds. */
  fixed_time: z.number().int().nonnegative().optional(),
  seed: seedSchema.optional(),
}).strict();

const rankingSchema = z.object({
  alpha: z.number().min(0).max(1).optional(),
  top_k: z.number().int().positive().optional(),
  semantic: z.enum(['token_overlap', 'hashed_embedding']).optional(),
  bm25: z.object({
    k1: z.number().positive().optional(),
    b: z.number().min(0).max(1).optional(),
  }).strict().optional(),
}).strict();

const freshnessThresholdSchema = z.object({
  months: z.number().positive(),
  penalty: z.number().min(0).max(1),
}).strict();

const scoringSchema = z.object({
  rubric_path: z.string().min(1).optional(),
  min_quotes: z.number().int().min(1).optional(),
  max_quote_words: z.number().int().min(5).optional(),
  max_quotes_per_document: z.number().int().min(1).optional(),
  freshness: z.array(freshnessThresholdSchema).optional(),
  strict_parity: z.boolean().optional(),
}).strict().superRefine((scoring, ctx) => {
  const thresholds = scoring.freshness ?? [];
  for (let i = 1; i < thresholds.length; i++) {
    if (thresholds[i].months <= thresholds[i - 1].months) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Freshness thresholds must be in increasing order of months',
        path: ['freshness', i, 'months'],
      });
    }
  }
});

const resolutionSchema = z.object({
  provider_timeout_ms: z.number().int().positive().optional(),
  concurrency: z.number().int().min(1).max(64).optional(),
  user_agent: z.string().min(1).optional(),
  max_retries: z.number().int().min(0).max(10).optional(),
}).strict();

const storageSchema = z.object({
  data_dir: z.string().min(1).optional(),
}).strict();

const outputSchema = z.object({
  dir: z.string().min(1).optional(),
  format: z.enum(['json', 'markdown', 'both']).optional(),
  filename_template: z.string().min(1).optional(),
}).strict();

const ConfigSchema = z.object({
  determinism: determinismSchema.optional(),
  ranking: rankingSchema.optional(),
  scoring: scoringSchema.optional(),
  resolution: resolutionSchema.optional(),
  providers: ProvidersConfigSchema.optional(),
  storage: storageSchema.optional(),
  output: outputSchema.optional(),
}).strict();

export type RawConfig = z.infer<typeof ConfigSchema>;

export interface Config {
  determinism: {
    enabled: boolean;
    fixed_time?: number;
    /** Decimal string so 64-bit seeds survive YAML and JSON. */
    seed?: string;
  };
  ranking: {
    alpha: number;
    top_k: number;
    semantic: SemanticScorerKind;
    bm25: { k1: number; b: number };
  };
  scoring: {
    /** Empty means the bundled rubric. */
    rubric_path: string;
    min_quotes: number;
    max_quote_words: number;
    max_quotes_per_document: number;
    freshness: FreshnessThreshold[];
    strict_parity: boolean;
  };
  resolution: {
    provider_timeout_ms: number;
    concurrency: number;
    user_agent?: string;
    max_retries: number;
  };
  providers: ProvidersConfig;
  storage: {
    data_dir: string;
  };
  output: {
    dir: string;
    format: OutputFormat;
    filename_template: string;
  };
}

export const ConfigDefaults: Config = {
  determinism: {
    enabled: false,
  },
  ranking: {
    alpha: 0.5,
    top_k: 8,
    semantic: 'hashed_embedding',
    bm25: { k1: 1.2, b: 0.75 },
  },
  scoring: {
    rubric_path: '',
    min_quotes: 2,
    max_quote_words: 30,
    max_quotes_per_document: 3,
    freshness: [
      { months: 24, penalty: 0.1 },
      { months: 36, penalty: 0.2 },
      { months: 48, penalty: 0.3 },
    ],
    strict_parity: false,
  },
  resolution: {
    provider_timeout_ms: 30000,
    concurrency: 4,
    max_retries: 2,
  },
  providers: {
    sec_edgar: { enabled: true, priority_offset: 0, include_company_facts: true },
    local: { enabled: true, priority_offset: 0, root: '~/.esgrade/reports' },
  },
  storage: {
    data_dir: '~/.esgrade/data',
  },
  output: {
    dir: './output',
    format: 'json',
    filename_template: '{org}-{year}',
  },
};

export { ConfigSchema };

import { z } from 'zod';
import { ConfigError, type ReportProvider, type SourceTier } from '@esgrade/core';
import { CompanyIrProvider, COMPANY_IR_PROVIDER_ID } from './company-ir.js';
import { LocalReportProvider, LOCAL_PROVIDER_ID } from './local.js';
import { SecEdgarProvider, SEC_EDGAR_PROVIDER_ID } from './sec-edgar/index.js';
import type { ProviderContext } from './types.js';
import { WebReportProvider, WEB_REPORT_PROVIDER_ID } from './web-report.js';

// ---------------------------------------------------------------------------
// Provider configuration
// ---------------------------------------------------------------------------

const tierSchema = z.union([z.literal(1), z.literal(2), z.literal(3)]);

const baseEntry = {
  enabled: z.boolean().default(true),
  /** Overrides the provider's default tier. */
  tier: tierSchema.optional(),
  priority_offset: z.number().min(-100).max(100).default(0),
};

export const SecEdgarEntrySchema = z.object({
  ...baseEntry,
  forms: z.array(z.string().min(1)).min(1).optional(),
  include_company_facts: z.boolean().default(true),
  min_interval_ms: z.number().int().nonnegative().optional(),
}).strict();

export const CompanyIrEntrySchema = z.object({
  ...baseEntry,
  reports: z.record(z.string(), z.array(z.string().min(1))).default({}),
}).strict();

export const LocalEntrySchema = z.object({
  ...baseEntry,
  root: z.string().min(1),
}).strict();

export const WebReportEntrySchema = z.object({
  ...baseEntry,
  templates: z.array(z.string().min(1)).default([]),
}).strict();

export const ProvidersConfigSchema = z.object({
  sec_edgar: SecEdgarEntrySchema.optional(),
  company_ir: CompanyIrEntrySchema.optional(),
  local: LocalEntrySchema.optional(),
  web_report: WebReportEntrySchema.optional(),
}).strict();

export type ProvidersConfig = z.output<typeof ProvidersConfigSchema>;
export type ProvidersConfigInput = z.input<typeof ProvidersConfigSchema>;
export type ProviderId = keyof ProvidersConfig;

export const DEFAULT_TIERS: Record<ProviderId, SourceTier> = {
  sec_edgar: 1,
  local: 1,
  company_ir: 2,
  web_report: 3,
};

/** Order of providers inside a tier. */
export const PROVIDER_ORDER: readonly ProviderId[] = [
  SEC_EDGAR_PROVIDER_ID,
  LOCAL_PROVIDER_ID,
  COMPANY_IR_PROVIDER_ID,
  WEB_REPORT_PROVIDER_ID,
];

export function parseProvidersConfig(raw: unknown): ProvidersConfig {
  const result = ProvidersConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(i => {
      const path = ['providers', ...i.path].join('.');
      return `${path}: ${i.message}`;
    });
    throw new ConfigError(`Invalid provider configuration:\n  ${issues.join('\n  ')}`, issues);
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Tier assembly
// ---------------------------------------------------------------------------

function createProvider(id: ProviderId, config: ProvidersConfig, context: ProviderContext): ReportProvider | undefined {
  switch (id) {
    case 'sec_edgar': {
      const entry = config.sec_edgar;
      if (!entry) return undefined;
      return new SecEdgarProvider(context, {
        enabled: entry.enabled,
        priorityOffset: entry.priority_offset,
        forms: entry.forms,
        includeCompanyFacts: entry.include_company_facts,
        minIntervalMs: entry.min_interval_ms,
      });
    }
    case 'company_ir': {
      const entry = config.company_ir;
      if (!entry) return undefined;
      return new CompanyIrProvider(context, {
        enabled: entry.enabled,
        priorityOffset: entry.priority_offset,
        reports: entry.reports,
      });
    }
    case 'local': {
      const entry = config.local;
      if (!entry) return undefined;
      return new LocalReportProvider(context, {
        enabled: entry.enabled,
        priorityOffset: entry.priority_offset,
        root: entry.root,
      });
    }
    case 'web_report': {
      const entry = config.web_report;
      if (!entry) return undefined;
      return new WebReportProvider(context, {
        enabled: entry.enabled,
        priorityOffset: entry.priority_offset,
        templates: entry.templates,
      });
    }
  }
}

/**
 * Build the resolver's tier lists from configuration. Only configured
 * providers are created; disabled ones are kept so the resolver reports them
 * as skipped. Trailing empty tiers are dropped.
 */
export function buildProviderTiers(config: ProvidersConfig, context: ProviderContext): ReportProvider[][] {
  const tiers: ReportProvider[][] = [[], [], []];

  for (const id of PROVIDER_ORDER) {
    const provider = createProvider(id, config, context);
    if (!provider) continue;
    const tier = config[id]?.tier ?? DEFAULT_TIERS[id];
    tiers[tier - 1].push(provider);
  }

  while (tiers.length > 0 && tiers[tiers.length - 1].length === 0) {
    tiers.pop();
  }
  if (tiers.length === 0) {
    throw new ConfigError('No report providers configured', ['providers']);
  }
  return tiers;
}

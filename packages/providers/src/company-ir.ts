import { companySlug, type CompanyRef } from '@esgrade/core';
import { UrlTemplateProvider } from './url-template.js';
import type { BaseProviderOptions, ProviderContext } from './types.js';

export const COMPANY_IR_PROVIDER_ID = 'company_ir';

export interface CompanyIrProviderOptions extends BaseProviderOptions {
  /** Report URL templates keyed by ticker or company slug. */
  reports?: Record<string, string[]>;
}

/** Sustainability reports published on a company's investor relations site. */
export class CompanyIrProvider extends UrlTemplateProvider {
  readonly id = COMPANY_IR_PROVIDER_ID;
  protected readonly basePriority = 20;
  private readonly reports: Map<string, string[]>;

  constructor(context: ProviderContext, options: CompanyIrProviderOptions = {}) {
    super(context, options);
    this.reports = new Map(
      Object.entries(options.reports ?? {}).map(([key, templates]) => [key.toLowerCase(), templates]),
    );
  }

  protected templatesFor(company: CompanyRef): readonly string[] {
    const byTicker = company.ticker ? this.reports.get(company.ticker.toLowerCase()) : undefined;
    return byTicker ?? this.reports.get(companySlug(company)) ?? [];
  }
}

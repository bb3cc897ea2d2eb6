import type { CompanyRef } from '@esgrade/core';
import { UrlTemplateProvider } from './url-template.js';
import type { BaseProviderOptions, ProviderContext } from './types.js';

export const WEB_REPORT_PROVIDER_ID = 'web_report';

export interface WebReportProviderOptions extends BaseProviderOptions {
  /** URL templates tried for every company, e.g. an aggregator's archive. */
  templates?: string[];
}

export class WebReportProvider extends UrlTemplateProvider {
  readonly id = WEB_REPORT_PROVIDER_ID;
  protected readonly basePriority = 50;
  private readonly templates: readonly string[];

  constructor(context: ProviderContext, options: WebReportProviderOptions = {}) {
    super(context, options);
    this.templates = options.templates ?? [];
  }

  protected templatesFor(_company: CompanyRef): readonly string[] {
    return this.templates;
  }
}

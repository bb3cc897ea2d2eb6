export {
  createProviderContext,
  applyPriorityOffset,
  contentTypeFor,
  DEFAULT_USER_AGENT,
  type ProviderContext,
  type ProviderContextOptions,
  type BaseProviderOptions,
} from './types.js';

export { fetchWithRetry, type FetchRetryConfig } from './retry.js';

export * from './sec-edgar/index.js';
export { UrlTemplateProvider, expandUrlTemplate } from './url-template.js';
export { CompanyIrProvider, COMPANY_IR_PROVIDER_ID, type CompanyIrProviderOptions } from './company-ir.js';
export { WebReportProvider, WEB_REPORT_PROVIDER_ID, type WebReportProviderOptions } from './web-report.js';
export { LocalReportProvider, LOCAL_PROVIDER_ID, type LocalProviderOptions } from './local.js';

export {
  ProvidersConfigSchema,
  SecEdgarEntrySchema,
  CompanyIrEntrySchema,
  LocalEntrySchema,
  WebReportEntrySchema,
  DEFAULT_TIERS,
  PROVIDER_ORDER,
  parseProvidersConfig,
  buildProviderTiers,
  type ProvidersConfig,
  type ProvidersConfigInput,
  type ProviderId,
} from './registry.js';

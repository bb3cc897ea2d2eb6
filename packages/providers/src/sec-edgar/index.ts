export {
  EdgarClient,
  normalizeCik,
  companyFactsUrl,
  filingDocumentUrl,
  EDGAR_DATA,
  EDGAR_ARCHIVES,
  SEC_COMPANY_TICKERS,
  type AnnualFiling,
  type EdgarClientOptions,
} from './client.js';
export { SecEdgarProvider, SEC_EDGAR_PROVIDER_ID, type SecEdgarProviderOptions } from './provider.js';

import {
  ProviderError,
  createResolvedDocument,
  createSourceCandidate,
  toError,
  type CompanyRef,
  type ReportProvider,
  type ResolvedDocument,
  type SourceCandidate,
  type SourceTier,
} from '@esgrade/core';
import { applyPriorityOffset, contentTypeFor, type BaseProviderOptions, type ProviderContext } from '../types.js';
import { EdgarClient, companyFactsUrl, type EdgarClientOptions } from './client.js';

export const SEC_EDGAR_PROVIDER_ID = 'sec_edgar';

const FILING_PRIORITY = 10;
const COMPANY_FACTS_PRIORITY = 60;

export interface SecEdgarProviderOptions extends BaseProviderOptions, EdgarClientOptions {
  /** Also offer the XBRL company facts JSON as a fallback (default: true). */
  includeCompanyFacts?: boolean;
}

/**
 * Annual report from SEC EDGAR. Offers the primary document of the newest
 * matching 10-K and, behind it, the company facts JSON.
 */
export class SecEdgarProvider implements ReportProvider {
  readonly id = SEC_EDGAR_PROVIDER_ID;
  readonly enabled: boolean;
  private readonly client: EdgarClient;

  constructor(
    private readonly context: ProviderContext,
    private readonly options: SecEdgarProviderOptions = {},
    client?: EdgarClient,
  ) {
    this.enabled = options.enabled ?? true;
    this.client = client ?? new EdgarClient(context, options);
  }

  async search(company: CompanyRef, year: number, tier: SourceTier, signal: AbortSignal): Promise<SourceCandidate[]> {
    try {
      const cik = await this.client.resolveCik(company, signal);
      if (!cik) return [];

      const [filing] = await this.client.listAnnualFilings(cik, year, signal);
      if (!filing) return [];

      const offset = this.options.priorityOffset;
      const attributes = {
        cik,
        form: filing.form,
        accessionNumber: filing.accessionNumber,
        filingDate: filing.filingDate,
        ...(filing.reportDate ? { reportDate: filing.reportDate } : {}),
        publishedAt: filing.filingDate,
      };

      const candidates = [
        createSourceCandidate({
          providerId: this.id,
          tier,
          priorityScore: applyPriorityOffset(FILING_PRIORITY, offset),
          access: 'api',
          contentType: contentTypeFor(filing.primaryDocument) ?? 'text/html',
          url: filing.documentUrl,
          title: `${filing.form} ${filing.reportDate || filing.filingDate}`,
          attributes,
        }),
      ];

      if (this.options.includeCompanyFacts ?? true) {
        candidates.push(createSourceCandidate({
          providerId: this.id,
          tier,
          priorityScore: applyPriorityOffset(COMPANY_FACTS_PRIORITY, offset),
          access: 'api',
          contentType: 'application/json',
          url: companyFactsUrl(cik),
          title: 'XBRL company facts',
          attributes,
        }));
      }

      return candidates;
    } catch (err) {
      throw new ProviderError(`EDGAR search failed: ${toError(err).message}`, this.id, 'search', false, { cause: err });
    }
  }

  async download(candidate: SourceCandidate, signal: AbortSignal): Promise<ResolvedDocument> {
    if (!candidate.url) {
      throw new ProviderError('EDGAR candidate has no URL', this.id, 'download');
    }
    try {
      const bytes = await this.client.download(candidate.url, signal);
      return createResolvedDocument(candidate, bytes, this.context.determinism.now());
    } catch (err) {
      throw new ProviderError(`EDGAR download failed: ${toError(err).message}`, this.id, 'download', false, { cause: err });
    }
  }
}

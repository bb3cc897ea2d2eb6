import {
  ProviderError,
  companySlug,
  createResolvedDocument,
  createSourceCandidate,
  toError,
  type AccessMethod,
  type CompanyRef,
  type ReportProvider,
  type ResolvedDocument,
  type SourceCandidate,
  type SourceTier,
} from '@esgrade/core';
import { fetchWithRetry } from './retry.js';
import { applyPriorityOffset, contentTypeFor, type BaseProviderOptions, type ProviderContext } from './types.js';

/**
 * Expand `{year}`, `{ticker}`, `{ticker_lower}`, `{slug}` and `{cik}`.
 * Returns `undefined` when the template needs a value the company lacks.
 */
export function expandUrlTemplate(template: string, company: CompanyRef, year: number): string | undefined {
  const values: Record<string, string | undefined> = {
    year: String(year),
    ticker: company.ticker,
    ticker_lower: company.ticker?.toLowerCase(),
    slug: companySlug(company),
    cik: company.cik,
  };
  let missing = false;
  const url = template.replace(/\{(\w+)\}/g, (match, name: string) => {
    if (!(name in values)) return match;
    const value = values[name];
    if (value === undefined) {
      missing = true;
      return match;
    }
    return encodeURIComponent(value);
  });
  return missing ? undefined : url;
}

/**
 * Provider whose candidates are URLs built from templates. Search makes no
 * network calls; download fetches the URL with retry. Earlier templates get
 * the lower (preferred) priority.
 */
export abstract class UrlTemplateProvider implements ReportProvider {
  abstract readonly id: string;
  readonly enabled: boolean;
  protected abstract readonly basePriority: number;
  protected readonly access: AccessMethod = 'scrape';

  constructor(
    protected readonly context: ProviderContext,
    protected readonly options: BaseProviderOptions,
  ) {
    this.enabled = options.enabled ?? true;
  }

  protected abstract templatesFor(company: CompanyRef): readonly string[];

  async search(company: CompanyRef, year: number, tier: SourceTier, signal: AbortSignal): Promise<SourceCandidate[]> {
    if (signal.aborted) return [];

    const seen = new Set<string>();
    const candidates: SourceCandidate[] = [];
    for (const template of this.templatesFor(company)) {
      const url = expandUrlTemplate(template, company, year);
      if (!url || seen.has(url)) continue;
      seen.add(url);

      candidates.push(createSourceCandidate({
        providerId: this.id,
        tier,
        priorityScore: applyPriorityOffset(this.basePriority + candidates.length, this.options.priorityOffset),
        access: this.access,
        contentType: contentTypeFor(url) ?? 'text/html',
        url,
        attributes: { template },
      }));
    }
    return candidates;
  }

  async download(candidate: SourceCandidate, signal: AbortSignal): Promise<ResolvedDocument> {
    if (!candidate.url) {
      throw new ProviderError(`Candidate from ${this.id} has no URL`, this.id, 'download');
    }

    let response: Response;
    try {
      response = await fetchWithRetry(
        candidate.url,
        { headers: { 'User-Agent': this.context.userAgent }, signal },
        this.context.retry,
      );
    } catch (err) {
      throw new ProviderError(`${this.id} download failed: ${toError(err).message}`, this.id, 'download', false, { cause: err });
    }

    const bytes = new Uint8Array(await response.arrayBuffer());
    const served = response.headers.get('Content-Type')?.split(';')[0].trim().toLowerCase();
    const resolved = served && served !== candidate.contentType
      ? createSourceCandidate({ ...candidate, contentType: served })
      : candidate;
    return createResolvedDocument(resolved, bytes, this.context.determinism.now());
  }
}

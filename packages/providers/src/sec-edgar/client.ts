import { z } from 'zod';
import type { CompanyRef } from '@esgrade/core';
import { fetchWithRetry } from '../retry.js';
import type { ProviderContext } from '../types.js';

export const EDGAR_DATA = 'https://data.sec.gov';
export const EDGAR_ARCHIVES = 'https://www.sec.gov/Archives/edgar/data';
export const SEC_COMPANY_TICKERS = 'https://www.sec.gov/files/company_tickers.json';

// SEC fair-access limit is 10 requests/second
const DEFAULT_MIN_INTERVAL_MS = 110;

// ---------------------------------------------------------------------------
// Response schemas
// ---------------------------------------------------------------------------

const TickerMapSchema = z.record(
  z.string(),
  z.object({
    cik_str: z.number().int().nonnegative(),
    ticker: z.string(),
    title: z.string(),
  }),
);

const SubmissionsSchema = z.object({
  name: z.string().optional(),
  filings: z.object({
    recent: z.object({
      accessionNumber: z.array(z.string()),
      filingDate: z.array(z.string()),
      reportDate: z.array(z.string()).optional(),
      form: z.array(z.string()),
      primaryDocument: z.array(z.string()),
    }),
  }),
});

export interface AnnualFiling {
  cik: string;
  form: string;
  accessionNumber: string;
  filingDate: string;
  /** Period of report, empty when the feed omits it. */
  reportDate: string;
  primaryDocument: string;
  documentUrl: string;
}

export interface EdgarClientOptions {
  /** Minimum spacing between requests from this client (default: 110). */
  minIntervalMs?: number;
  /** Forms treated as the annual report (default: ['10-K']). */
  forms?: string[];
}

/** Zero-pad a 1-10 digit CIK, `undefined` for anything else. */
export function normalizeCik(value: string): string | undefined {
  const trimmed = value.trim();
  return /^\d{1,10}$/.test(trimmed) ? trimmed.padStart(10, '0') : undefined;
}

export function companyFactsUrl(cik: string): string {
  return `${EDGAR_DATA}/api/xbrl/companyfacts/CIK${cik}.json`;
}

export function filingDocumentUrl(cik: string, accessionNumber: string, primaryDocument: string): string {
  return `${EDGAR_ARCHIVES}/${String(Number(cik))}/${accessionNumber.replace(/-/g, '')}/${primaryDocument}`;
}

/**
 * Minimal SEC EDGAR client: ticker to CIK, annual filings from the
 * submissions feed, raw document download. One instance keeps its own rate
 * limit and CIK cache.
 */
export class EdgarClient {
  private lastRequestTime = 0;
  private readonly cikCache = new Map<string, string | null>();
  private readonly minIntervalMs: number;
  private readonly forms: Set<string>;

  constructor(
    private readonly context: ProviderContext,
    options: EdgarClientOptions = {},
  ) {
    this.minIntervalMs = options.minIntervalMs ?? DEFAULT_MIN_INTERVAL_MS;
    this.forms = new Set(options.forms ?? ['10-K']);
  }

  async request(url: string, accept: string, signal?: AbortSignal): Promise<Response> {
    await this.rateLimit();
    return fetchWithRetry(
      url,
      {
        headers: {
          'User-Agent': this.context.userAgent,
          'Accept': accept,
        },
        signal,
      },
      { maxRetries: 3, initialDelayMs: 1000, backoffMultiplier: 2, ...this.context.retry },
    );
  }

  async fetchJson<S extends z.ZodTypeAny>(url: string, schema: S, signal?: AbortSignal): Promise<z.infer<S>> {
    const response = await this.request(url, 'application/json', signal);
    const parsed = schema.safeParse(await response.json());
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
      throw new Error(`Unexpected EDGAR response from ${url}: ${issues}`);
    }
    return parsed.data;
  }

  /**
   * CIK from the company's explicit `cik`, a numeric ticker, or the SEC
   * ticker map (by ticker, then by exact registrant name).
   */
  async resolveCik(company: CompanyRef, signal?: AbortSignal): Promise<string | undefined> {
    if (company.cik) {
      return normalizeCik(company.cik);
    }
    if (company.ticker) {
      const numeric = normalizeCik(company.ticker);
      if (numeric) return numeric;
    }

    const key = (company.ticker ?? company.name).toUpperCase();
    if (this.cikCache.has(key)) {
      return this.cikCache.get(key) ?? undefined;
    }

    const entries = Object.values(await this.fetchJson(SEC_COMPANY_TICKERS, TickerMapSchema, signal));
    const match = company.ticker
      ? entries.find(e => e.ticker.toUpperCase() === key)
      : entries.find(e => e.title.toUpperCase() === key);
    const cik = match ? String(match.cik_str).padStart(10, '0') : null;
    this.cikCache.set(key, cik);
    return cik ?? undefined;
  }

  /**
   * Annual filings covering `year`: the report period falls in that year, or,
   * when the feed has no report date, the filing does. Newest filing first.
   */
  async listAnnualFilings(cik: string, year: number, signal?: AbortSignal): Promise<AnnualFiling[]> {
    const url = `${EDGAR_DATA}/submissions/CIK${cik}.json`;
    const { filings } = await this.fetchJson(url, SubmissionsSchema, signal);
    const recent = filings.recent;
    const results: AnnualFiling[] = [];

    for (let i = 0; i < recent.form.length; i++) {
      const form = recent.form[i];
      if (!this.forms.has(form)) continue;

      const accessionNumber = recent.accessionNumber[i];
      const filingDate = recent.filingDate[i] ?? '';
      const reportDate = recent.reportDate?.[i] ?? '';
      const primaryDocument = recent.primaryDocument[i];
      if (!accessionNumber || !primaryDocument) continue;

      const periodYear = reportDate ? reportDate.slice(0, 4) : filingDate.slice(0, 4);
      if (periodYear !== String(year)) continue;

      results.push({
        cik,
        form,
        accessionNumber,
        filingDate,
        reportDate,
        primaryDocument,
        documentUrl: filingDocumentUrl(cik, accessionNumber, primaryDocument),
      });
    }

    return results.sort((a, b) =>
      a.filingDate < b.filingDate ? 1 : a.filingDate > b.filingDate ? -1 : a.accessionNumber.localeCompare(b.accessionNumber),
    );
  }

  async download(url: string, signal?: AbortSignal): Promise<Uint8Array> {
    const response = await this.request(url, '*/*', signal);
    return new Uint8Array(await response.arrayBuffer());
  }

  private async rateLimit(): Promise<void> {
    const now = Date.now();
    const elapsed = now - this.lastRequestTime;
    if (elapsed < this.minIntervalMs) {
      await new Promise(resolve => setTimeout(resolve, this.minIntervalMs - elapsed));
    }
    this.lastRequestTime = Date.now();
  }
}

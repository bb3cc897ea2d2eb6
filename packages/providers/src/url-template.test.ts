import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ProviderError, createDeterminismContext } from '@esgrade/core';
import { CompanyIrProvider } from './company-ir.js';
import { createProviderContext } from './types.js';
import { expandUrlTemplate } from './url-template.js';
import { WebReportProvider } from './web-report.js';

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

const determinism = createDeterminismContext({ enabled: true, fixedTime: 1700000000, seed: 7 });
const context = createProviderContext(determinism, { retry: { initialDelayMs: 1, maxRetries: 0 } });
const signal = new AbortController().signal;

const ACME = { name: 'Acme Corp', ticker: 'ACME' };

beforeEach(() => {
  mockFetch.mockReset();
});

describe('expandUrlTemplate', () => {
  it('substitutes company and year placeholders', () => {
    expect(expandUrlTemplate('https://ir.example.com/{ticker_lower}/esg-{year}.html', ACME, 2023))
      .toBe('https://ir.example.com/acme/esg-2023.html');
    expect(expandUrlTemplate('https://reports.example.org/{slug}/{ticker}', ACME, 2023))
      .toBe('https://reports.example.org/acme-corp/ACME');
  });

  it('returns undefined when the company lacks a value', () => {
    expect(expandUrlTemplate('https://ir.example.com/{ticker}/{year}', { name: 'Acme Corp' }, 2023)).toBeUndefined();
  });

  it('leaves unknown placeholders alone', () => {
    expect(expandUrlTemplate('https://x.example.com/{lang}/{year}', ACME, 2022)).toBe('https://x.example.com/{lang}/2022');
  });
});

describe('CompanyIrProvider', () => {
  const reports = {
    acme: ['https://ir.example.com/{year}/report.html', 'https://ir.example.com/{year}/report.txt'],
    'beta-holdings': ['https://beta.example.com/esg/{year}'],
  };

  it('builds candidates from the ticker entry in template order', async () => {
    const provider = new CompanyIrProvider(context, { reports });
    const candidates = await provider.search(ACME, 2023, 2, signal);

    expect(candidates.map(c => [c.url, c.priorityScore, c.contentType, c.access, c.tier])).toEqual([
      ['https://ir.example.com/2023/report.html', 20, 'text/html', 'scrape', 2],
      ['https://ir.example.com/2023/report.txt', 21, 'text/plain', 'scrape', 2],
    ]);
  });

  it('falls back to the company slug', async () => {
    const provider = new CompanyIrProvider(context, { reports, priorityOffset: -5 });
    const candidates = await provider.search({ name: 'Beta Holdings' }, 2022, 2, signal);

    expect(candidates.map(c => [c.url, c.priorityScore])).toEqual([['https://beta.example.com/esg/2022', 15]]);
  });

  it('returns nothing for an unconfigured company', async () => {
    const provider = new CompanyIrProvider(context, { reports });
    expect(await provider.search({ name: 'Gamma' }, 2023, 2, signal)).toEqual([]);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('takes the served content type on download', async () => {
    mockFetch.mockResolvedValueOnce(
      new Response('Scope 1 emissions fell.', { status: 200, headers: { 'Content-Type': 'text/plain; charset=utf-8' } }),
    );
    const provider = new CompanyIrProvider(context, { reports });
    const [candidate] = await provider.search(ACME, 2023, 2, signal);
    const document = await provider.download(candidate, signal);

    expect(document.candidate.contentType).toBe('text/plain');
    expect(document.candidate.url).toBe('https://ir.example.com/2023/report.html');
    expect(new TextDecoder().decode(document.bytes)).toBe('Scope 1 emissions fell.');
    expect(document.retrievedAt).toBe('2023-11-14T22:13:20.000Z');
  });

  it('wraps HTTP failures in ProviderError', async () => {
    mockFetch.mockResolvedValueOnce(new Response(null, { status: 404, statusText: 'Not Found' }));
    const provider = new CompanyIrProvider(context, { reports });
    const [candidate] = await provider.search(ACME, 2023, 2, signal);
    const error = await provider.download(candidate, signal).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({
      operation: 'download',
      message: 'company_ir download failed: HTTP 404 Not Found for https://ir.example.com/2023/report.html',
    });
  });
});

describe('WebReportProvider', () => {
  it('applies every template to every company and drops duplicates', async () => {
    const provider = new WebReportProvider(context, {
      templates: [
        'https://reports.example.org/{slug}/{year}.html',
        'https://reports.example.org/{slug}/{year}.html',
        'https://archive.example.org/{ticker}/{year}.json',
      ],
    });
    const candidates = await provider.search({ name: 'Acme Corp' }, 2023, 3, signal);

    expect(candidates.map(c => [c.providerId, c.url, c.priorityScore])).toEqual([
      ['web_report', 'https://reports.example.org/acme-corp/2023.html', 50],
    ]);
  });

  it('can be disabled', () => {
    expect(new WebReportProvider(context, { enabled: false }).enabled).toBe(false);
  });
});

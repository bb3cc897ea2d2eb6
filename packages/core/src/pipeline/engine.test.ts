import { describe, it, expect, vi } from 'vitest';
import { ScoringEngine, unitKey } from './engine.js';
import { BatchRunner, compareUnits } from './batch.js';
import { createDeterminismContext, stableHash } from '../determinism/index.js';
import { PlainTextExtractor } from '../extraction/index.js';
import { HybridRanker, TokenOverlapScorer, type RankCandidate, type RankedResult } from '../ranking/index.js';
import {
  CandidateResolver,
  createResolvedDocument,
  createSourceCandidate,
  type CompanyRef,
  type ReportProvider,
  type SourceTier,
} from '../resolver/index.js';
import { RubricScorer, parseRubric, type EvidenceQuote } from '../scoring/index.js';
import { MemoryDocumentStore } from '../storage/index.js';
import { CancelledError, ConfigError, ExtractionError, ParityViolation } from '../errors.js';
import type { ParityViolationEvent } from './engine.js';

const determinism = createDeterminismContext({ enabled: true, fixedTime: 1700000000, seed: 7 });

const rubric = parseRubric({
  version: '1',
  name: 'test-rubric',
  themes: [
    {
      id: 'GHG',
      name: 'Emissions',
      query: 'emissions assurance scenario',
      stages: [
        { stage: 1, description: 'Mentions emissions', keywords: ['emissions'] },
        { stage: 3, description: 'Assured', patterns: ['limited assurance', 'scenario analysis'] },
      ],
    },
    {
      id: 'RD',
      name: 'Reporting',
      query: 'TCFD report',
      min_quotes: 1,
      stages: [{ stage: 2, description: 'Framework', keywords: ['TCFD'] }],
    },
  ],
});

const REPORT = [
  'Our emissions fell this year.',
  'We obtained limited assurance over Scope 1 and 2 data.',
  'Scenario analysis covered all operating sites.',
  'Our TCFD report is published every spring.',
].join('\n\n');

function memoryProvider(reports: Record<string, string>): ReportProvider {
  return {
    id: 'memory',
    search: vi.fn(async (company: CompanyRef, year: number, tier: SourceTier) => {
      if (reports[company.name] === undefined) return [];
      return [createSourceCandidate({
        providerId: 'memory',
        tier,
        priorityScore: 10,
        access: 'file',
        contentType: 'text/plain',
        title: `${company.name} ${year}`,
        attributes: { company: company.name },
      })];
    }),
    download: async candidate => {
      const text = reports[candidate.attributes?.['company'] ?? ''] ?? '';
      return createResolvedDocument(candidate, new TextEncoder().encode(text), determinism.now());
    },
  };
}

function buildEngine(
  reports: Record<string, string> = { Acme: REPORT },
  scorer = new RubricScorer({ rubric, determinism }),
  strictParity = false,
) {
  const provider = memoryProvider(reports);
  const engine = new ScoringEngine({
    resolver: new CandidateResolver({ tiers: [[provider]] }),
    extractor: new PlainTextExtractor({ maxSpanChars: 60 }),
    store: new MemoryDocumentStore(),
    ranker: new HybridRanker(new TokenOverlapScorer(determinism.seed)),
    scorer,
    determinism,
    alpha: 0.6,
    topK: 10,
    strictParity,
  });
  return { engine, provider };
}

const acme: CompanyRef = { name: 'Acme', ticker: 'ACME' };

describe('ScoringEngine', () => {
  it('scores every theme of a unit in id order', async () => {
    const { engine } = buildEngine();
    const result = await engine.scoreUnit({ company: acme, year: 2023 });

    expect(result.key).toBe('acme:2023');
    expect(result.spanCount).toBe(4);
    expect(result.attempts).toBe(1);
    expect(result.snapshotId).toMatch(/^snap_[0-9a-f]{16}$/);
    expect(result.themes.map(t => [t.theme, t.score.stage])).toEqual([['GHG', 3], ['RD', 2]]);

    const ghg = result.themes[0];
    expect(ghg.score.confidence).toBe(1);
    expect(ghg.score.evidenceIds).toHaveLength(2);
    expect(ghg.parity.verdict).toBe('pass');
    expect(ghg.parity.evidenceIds).toEqual([
      `${result.source.id}#31`,
      `${result.source.id}#87`,
    ]);
    expect(result.source).toMatchObject({ providerId: 'memory', tier: 1, contentType: 'text/plain' });
    expect(result.source.contentHash).toBe(stableHash(REPORT));
  });

  it('produces identical results on repeated runs', async () => {
    const first = await buildEngine().engine.scoreUnit({ company: acme, year: 2023 });
    const second = await buildEngine().engine.scoreUnit({ company: acme, year: 2023 });
    expect(second).toEqual(first);
  });

  it('emits stage events in pipeline order', async () => {
    const { engine } = buildEngine();
    const stages: string[] = [];
    engine.on('unit:stage', event => stages.push(event.theme ? `${event.stage}:${event.theme}` : event.stage));

    await engine.scoreUnit({ company: acme, year: 2023 }, ['RD']);
    expect(stages).toEqual(['resolve', 'extract', 'store', 'rank:RD', 'score:RD', 'validate:RD']);
  });

  it('rejects an unknown theme', async () => {
    const { engine } = buildEngine();
    await expect(engine.scoreUnit({ company: acme, year: 2023 }, ['XYZ'])).rejects.toThrow(ConfigError);
  });

  it('fails the unit when the document has no text', async () => {
    const { engine } = buildEngine({ Acme: '   \n\n  ' });
    await expect(engine.scoreUnit({ company: acme, year: 2023 })).rejects.toThrow(ExtractionError);
  });

  it('stops before resolving when already cancelled', async () => {
    const { engine, provider } = buildEngine();
    const controller = new AbortController();
    controller.abort();

    await expect(engine.scoreUnit({ company: acme, year: 2023 }, undefined, controller.signal))
      .rejects.toThrow(new CancelledError('Cancelled before resolve'));
    expect(provider.search).not.toHaveBeenCalled();
  });

  describe('parity', () => {
    // Cites a span that never reaches the ranked top-K
    class OffListScorer extends RubricScorer {
      override extractEvidence(themeId: string, ranked: readonly RankedResult[], candidates: readonly RankCandidate[]): EvidenceQuote[] {
        const quotes = super.extractEvidence(themeId, ranked, candidates);
        return [
          ...quotes,
          {
            id: 'ev_offlist0001',
            documentId: 'elsewhere#0',
            quote: 'Scenario analysis was extended to suppliers.',
            offset: 0,
            theme: themeId,
            contentHash: 'offlist',
          },
        ];
      }
    }

    it('emits parity:violation when cited evidence is outside the top-K', async () => {
      const { engine } = buildEngine(undefined, new OffListScorer({ rubric, determinism }));
      const violations: ParityViolationEvent[] = [];
      engine.on('parity:violation', event => violations.push(event));

      const result = await engine.scoreUnit({ company: acme, year: 2023 }, ['GHG']);

      expect(result.themes[0].parity.verdict).toBe('fail');
      expect(result.themes[0].parity.missingIds).toEqual(['elsewhere#0']);
      expect(violations).toHaveLength(1);
      expect(violations[0].key).toBe('acme:2023');
    });

    it('throws in strict mode', async () => {
      const { engine } = buildEngine(undefined, new OffListScorer({ rubric, determinism }), true);
      await expect(engine.scoreUnit({ company: acme, year: 2023 }, ['GHG'])).rejects.toThrow(ParityViolation);
    });
  });
});

describe('BatchRunner', () => {
  const units = [
    { company: { name: 'Beta' }, year: 2023 },
    { company: { name: 'Broken' }, year: 2023 },
    { company: acme, year: 2023 },
    { company: acme, year: 2022 },
  ];

  it('returns results and error records in canonical order', async () => {
    const { engine } = buildEngine({ Acme: REPORT, Beta: REPORT });
    const runner = new BatchRunner(engine, { concurrency: 2 });
    const done = vi.fn();
    runner.on('unit:done', done);

    const outcome = await runner.run(units);

    expect(outcome.results.map(r => r.key)).toEqual(['acme:2022', 'acme:2023', 'beta:2023']);
    expect(outcome.errors).toEqual([{
      key: 'broken:2023',
      company: 'Broken',
      year: 2023,
      error: {
        name: 'ResolutionFailed',
        message: 'No report candidates found for Broken (2023). Searched 1 providers across 1 tiers',
        details: { company: 'Broken', year: 2023, attempts: 0, lastError: null },
      },
    }]);
    expect(outcome.parity).toEqual({ total: 6, passed: 6, failed: 0, passRate: 1, failingQueries: [] });
    expect(done).toHaveBeenCalledTimes(4);
  });

  it('is insensitive to concurrency', async () => {
    const serial = await new BatchRunner(buildEngine({ Acme: REPORT, Beta: REPORT }).engine, { concurrency: 1 }).run(units);
    const parallel = await new BatchRunner(buildEngine({ Acme: REPORT, Beta: REPORT }).engine, { concurrency: 4 }).run(units);
    expect(parallel).toEqual(serial);
  });

  it('fails the whole batch on an unknown theme before any unit runs', async () => {
    const { engine, provider } = buildEngine();
    const runner = new BatchRunner(engine, { concurrency: 2, themes: ['NOPE'] });
    await expect(runner.run(units)).rejects.toThrow(ConfigError);
    expect(provider.search).not.toHaveBeenCalled();
  });

  it('records every unit as cancelled when the signal has fired', async () => {
    const controller = new AbortController();
    controller.abort();
    const { engine } = buildEngine();
    const outcome = await new BatchRunner(engine, { concurrency: 1, signal: controller.signal }).run(units);

    expect(outcome.results).toEqual([]);
    expect(outcome.errors.map(e => e.error.name)).toEqual(['CancelledError', 'CancelledError', 'CancelledError', 'CancelledError']);
  });

  it('rejects duplicate units', async () => {
    const { engine } = buildEngine();
    await expect(new BatchRunner(engine, { concurrency: 1 }).run([units[2], units[2]])).rejects.toThrow('Duplicate unit acme:2023');
  });
});

describe('unit keys', () => {
  it('orders by company name, ticker and year', () => {
    const sorted = [
      { company: { name: 'b' }, year: 2020 },
      { company: { name: 'a', ticker: 'Z' }, year: 2020 },
      { company: { name: 'a', ticker: 'A' }, year: 2021 },
      { company: { name: 'a', ticker: 'A' }, year: 2019 },
    ].sort(compareUnits);
    expect(sorted.map(u => `${u.company.name}${u.company.ticker ?? ''}${u.year}`)).toEqual(['aA2019', 'aA2021', 'aZ2020', 'b2020']);
  });

  it('slugs the company name', () => {
    expect(unitKey({ name: 'Acme Holdings, Inc.' }, 2023)).toBe('acme-holdings-inc:2023');
  });
});

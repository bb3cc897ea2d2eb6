import { EventEmitter } from 'eventemitter3';
import { HASH_VERSION, deriveSnapshotId, type DeterminismContext } from '../determinism/index.js';
import { ExtractionError, throwIfAborted } from '../errors.js';
import type { TextExtractor, TextSpan } from '../extraction/index.js';
import { assertParity, check, type ParityReport } from '../parity/index.js';
import { buildRankPool, type Bm25Params, type HybridRanker } from '../ranking/index.js';
import { companySlug, type CandidateResolver, type CompanyRef } from '../resolver/index.js';
import type { RubricScorer, StageScore } from '../scoring/index.js';
import type { DocumentStore } from '../storage/index.js';
import type { ThemeResult, UnitRequest, UnitResult, UnitStage } from './types.js';

// ---------------------------------------------------------------------------
// Engine event types
// ---------------------------------------------------------------------------

export interface UnitStartEvent {
  key: string;
  company: CompanyRef;
  year: number;
}

export interface UnitStageEvent {
  key: string;
  stage: UnitStage;
  theme?: string;
}

export interface ThemeScoredEvent {
  key: string;
  score: StageScore;
  parity: ParityReport;
}

export interface ParityViolationEvent {
  key: string;
  report: ParityReport;
}

export interface UnitCompleteEvent {
  result: UnitResult;
  durationMs: number;
}

export interface EngineEvents {
  'unit:start': (event: UnitStartEvent) => void;
  'unit:stage': (event: UnitStageEvent) => void;
  'theme:scored': (event: ThemeScoredEvent) => void;
  'parity:violation': (event: ParityViolationEvent) => void;
  'unit:complete': (event: UnitCompleteEvent) => void;
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export interface ScoringEngineOptions {
  resolver: CandidateResolver;
  extractor: TextExtractor;
  store: DocumentStore;
  ranker: HybridRanker;
  scorer: RubricScorer;
  determinism: DeterminismContext;
  /** Weight of the lexical score in fusion. */
  alpha: number;
  topK: number;
  bm25?: Bm25Params;
  /** Throw ParityViolation instead of only emitting `parity:violation`. */
  strictParity?: boolean;
}

export function unitKey(company: CompanyRef, year: number): string {
  return `${companySlug(company)}:${year}`;
}

/**
 * Runs one (company, year) unit: resolve a report, extract and store its
 * spans, then rank, score and validate each theme in id order.
 */
export class ScoringEngine extends EventEmitter<EngineEvents> {
  constructor(private readonly options: ScoringEngineOptions) {
    super();
  }

  get scorer(): RubricScorer {
    return this.options.scorer;
  }

  /** Theme ids to score, sorted; every id must exist in the rubric. */
  selectThemes(themes?: readonly string[]): string[] {
    const ids = themes && themes.length > 0 ? themes : this.options.scorer.rubric.themes.map(t => t.id);
    const unique = [...new Set(ids)].sort();
    for (const id of unique) this.options.scorer.theme(id);
    return unique;
  }

  async scoreUnit(request: UnitRequest, themes?: readonly string[], signal?: AbortSignal): Promise<UnitResult> {
    const { resolver, extractor, store, ranker, scorer, determinism, alpha, topK } = this.options;
    const { company, year } = request;
    const key = unitKey(company, year);
    const orgId = companySlug(company);
    const themeIds = this.selectThemes(themes);
    const startedAt = performance.now();

    this.emit('unit:start', { key, company, year });

    throwIfAborted(signal, 'resolve');
    this.emit('unit:stage', { key, stage: 'resolve' });
    const resolution = await resolver.resolveBest(company, year, signal);
    const { document } = resolution;

    throwIfAborted(signal, 'extract');
    this.emit('unit:stage', { key, stage: 'extract' });
    const extracted = extractor.extract(document);
    if (extracted.length === 0) {
      throw new ExtractionError(
        `No text extracted from ${document.id}`,
        document.id,
        document.candidate.contentType,
      );
    }

    throwIfAborted(signal, 'store');
    this.emit('unit:stage', { key, stage: 'store' });
    await store.put(orgId, year, extracted);
    const spans = await store.list(orgId, year);

    const snapshotId = deriveSnapshotId({
      hash: HASH_VERSION,
      org: orgId,
      year,
      themes: themeIds,
      rubric: scorer.rubric.fingerprint,
      document: document.contentHash,
      spans: spans.map(s => s.id),
      alpha,
      topK,
      semantic: ranker.semanticModel,
      seed: determinism.seed.toString(),
    });

    const results: ThemeResult[] = [];
    for (const themeId of themeIds) {
      results.push(this.scoreTheme(key, orgId, year, snapshotId, themeId, spans, signal));
    }

    const result: UnitResult = {
      key,
      company,
      year,
      orgId,
      snapshotId,
      source: {
        id: document.id,
        providerId: document.candidate.providerId,
        tier: document.candidate.tier,
        ...(document.candidate.url !== undefined ? { url: document.candidate.url } : {}),
        contentType: document.candidate.contentType,
        contentHash: document.contentHash,
        byteLength: document.byteLength,
        retrievedAt: document.retrievedAt,
      },
      attempts: resolution.attempts,
      spanCount: spans.length,
      themes: results,
    };

    this.emit('unit:complete', { result, durationMs: Math.round(performance.now() - startedAt) });
    return result;
  }

  private scoreTheme(
    key: string,
    orgId: string,
    year: number,
    snapshotId: string,
    themeId: string,
    spans: readonly TextSpan[],
    signal: AbortSignal | undefined,
  ): ThemeResult {
    const { ranker, scorer, alpha, topK, bm25 } = this.options;
    const theme = scorer.theme(themeId);

    throwIfAborted(signal, 'rank');
    this.emit('unit:stage', { key, stage: 'rank', theme: themeId });
    const candidates = buildRankPool(theme.query, spans, bm25);
    const ranked = ranker.rank(theme.query, candidates, alpha, topK);

    throwIfAborted(signal, 'score');
    this.emit('unit:stage', { key, stage: 'score', theme: themeId });
    const evidence = scorer.extractEvidence(themeId, ranked, candidates);
    const score = scorer.score(themeId, evidence, orgId, year, snapshotId);

    throwIfAborted(signal, 'validate');
    this.emit('unit:stage', { key, stage: 'validate', theme: themeId });
    const cited = new Set(score.evidenceIds);
    const citedDocuments = evidence.filter(q => cited.has(q.id)).map(q => q.documentId);
    const parity = check(theme.query, citedDocuments, ranked.map(r => r.documentId));

    if (parity.verdict === 'fail') {
      this.emit('parity:violation', { key, report: parity });
      if (this.options.strictParity) assertParity(parity);
    }

    this.emit('theme:scored', { key, score, parity });
    return { theme: themeId, query: theme.query, score, evidence, topK: ranked, parity };
  }
}

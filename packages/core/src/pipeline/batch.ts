import { EventEmitter } from 'eventemitter3';
import { InvalidInput, isEngineError, toError } from '../errors.js';
import { summarize } from '../parity/index.js';
import type { CompanyRef } from '../resolver/index.js';
import { unitKey, type ScoringEngine } from './engine.js';
import { Semaphore } from './semaphore.js';
import type { BatchOutcome, UnitErrorRecord, UnitRequest, UnitResult } from './types.js';

export interface BatchStartEvent {
  total: number;
  concurrency: number;
  themes: string[];
}

export interface UnitDoneEvent {
  key: string;
  ok: boolean;
  completed: number;
  total: number;
  error?: UnitErrorRecord;
}

export interface BatchEvents {
  'batch:start': (event: BatchStartEvent) => void;
  'unit:done': (event: UnitDoneEvent) => void;
  'batch:complete': (event: BatchOutcome) => void;
}

export interface BatchRunnerOptions {
  concurrency: number;
  /** Theme ids; all rubric themes when omitted. */
  themes?: readonly string[];
  signal?: AbortSignal;
}

/**
 * Runs units concurrently under a FIFO semaphore. A failed or cancelled unit
 * becomes an error record; the batch always completes. Results and errors
 * come back in canonical (company, ticker, year) order regardless of
 * completion order.
 */
export class BatchRunner extends EventEmitter<BatchEvents> {
  private readonly semaphore: Semaphore;

  constructor(
    private readonly engine: ScoringEngine,
    private readonly options: BatchRunnerOptions,
  ) {
    super();
    this.semaphore = new Semaphore(options.concurrency);
  }

  async run(units: readonly UnitRequest[]): Promise<BatchOutcome> {
    // Unknown themes fail the whole batch before any unit starts
    const themes = this.engine.selectThemes(this.options.themes);
    const ordered = [...units].sort(compareUnits);
    assertUniqueKeys(ordered);

    const { signal } = this.options;
    const total = ordered.length;
    let completed = 0;
    this.emit('batch:start', { total, concurrency: this.options.concurrency, themes });

    const settled = await Promise.all(ordered.map(async unit => {
      const key = unitKey(unit.company, unit.year);
      try {
        const result = await this.semaphore.run(() => this.engine.scoreUnit(unit, themes, signal), signal);
        completed++;
        this.emit('unit:done', { key, ok: true, completed, total });
        return { ok: true as const, result };
      } catch (err) {
        const record = toErrorRecord(key, unit, err);
        completed++;
        this.emit('unit:done', { key, ok: false, completed, total, error: record });
        return { ok: false as const, record };
      }
    }));

    const results: UnitResult[] = [];
    const errors: UnitErrorRecord[] = [];
    for (const entry of settled) {
      if (entry.ok) results.push(entry.result);
      else errors.push(entry.record);
    }

    const outcome: BatchOutcome = {
      results,
      errors,
      parity: summarize(results.flatMap(r => r.themes.map(t => t.parity))),
    };
    this.emit('batch:complete', outcome);
    return outcome;
  }
}

export function toErrorRecord(key: string, unit: UnitRequest, err: unknown): UnitErrorRecord {
  const error = toError(err);
  return {
    key,
    company: unit.company.name,
    year: unit.year,
    error: {
      name: error.name,
      message: error.message,
      details: isEngineError(error) ? error.details() : {},
    },
  };
}

/** Company name, then ticker, then year. Code unit order. */
export function compareUnits(a: UnitRequest, b: UnitRequest): number {
  return (
    compareText(a.company.name, b.company.name) ||
    compareText(a.company.ticker ?? '', b.company.ticker ?? '') ||
    a.year - b.year
  );
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function assertUniqueKeys(units: readonly UnitRequest[]): void {
  const seen = new Map<string, CompanyRef>();
  for (const unit of units) {
    const key = unitKey(unit.company, unit.year);
    const previous = seen.get(key);
    if (previous) {
      throw new InvalidInput(
        `Duplicate unit ${key}: "${previous.name}" and "${unit.company.name}" share a key`,
        'units',
      );
    }
    seen.set(key, unit.company);
  }
}

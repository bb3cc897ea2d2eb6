import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import {
  ConfigError,
  isEngineError,
  toError,
  type BatchOutcome,
  type BatchRunner,
  type UnitResult,
} from '@esgrade/core';
import type { Runtime } from './runtime.js';

export interface ReporterOptions {
  verbose?: boolean;
  json?: boolean;
}

/**
 * Prints engine and resolver events for interactive runs. Warnings go to
 * stderr so `--json` output on stdout stays machine-readable.
 */
export function attachReporter(runtime: Runtime, options: ReporterOptions): Ora | undefined {
  const { resolver, engine } = runtime;

  resolver.on('provider:error', event => {
    if (options.json) return;
    console.error(chalk.yellow(`  Warning: ${event.providerId} (tier ${event.tier}): ${event.error.message}`));
  });

  resolver.on('download:failed', event => {
    if (options.json) return;
    const target = event.candidate.url ?? event.candidate.title ?? event.candidate.providerId;
    console.error(chalk.yellow(`  Download failed (${event.attempt}): ${target}: ${event.error.message}`));
  });

  engine.on('parity:violation', event => {
    if (options.json) return;
    const missing = event.report.missingIds.join(', ');
    console.error(chalk.red.bold(`  PARITY VIOLATION ${event.key} "${event.report.query}": ${missing}`));
  });

  if (options.json) return undefined;

  const spinner = ora({ prefixText: chalk.dim(' ') });

  if (options.verbose) {
    resolver.on('provider:results', event => {
      console.error(chalk.dim(`    ${event.providerId} (tier ${event.tier}): ${event.count} candidates`));
    });
    resolver.on('provider:skipped', event => {
      console.error(chalk.dim(`    ${event.providerId} (tier ${event.tier}): disabled`));
    });
    resolver.on('download:resolved', event => {
      console.error(chalk.dim(`    resolved ${event.document.id} after ${event.attempt} attempt(s)`));
    });
    engine.on('unit:stage', event => {
      spinner.text = `${chalk.bold(event.key)} ${chalk.dim(event.theme ? `${event.stage} ${event.theme}` : event.stage)}`;
    });
  }

  return spinner;
}

/** Progress line for batch runs. */
export function attachBatchProgress(batch: BatchRunner, spinner: Ora | undefined): void {
  if (!spinner) return;

  batch.on('batch:start', event => {
    spinner.start(`Scoring ${event.total} units ${chalk.dim(`(concurrency ${event.concurrency}, themes ${event.themes.join(', ')})`)}`);
  });

  batch.on('unit:done', event => {
    spinner.text = `Scoring ${event.completed}/${event.total}`;
    if (!event.ok && event.error) {
      spinner.clear();
      console.error(chalk.red(`  ✗ ${event.key}: ${event.error.error.message}`));
      spinner.render();
    }
  });

  batch.on('batch:complete', outcome => {
    const failed = outcome.errors.length;
    const summary = `${outcome.results.length} scored, ${failed} failed`;
    if (failed > 0) {
      spinner.warn(summary);
    } else {
      spinner.succeed(summary);
    }
  });
}

export function printUnitResult(result: UnitResult): void {
  const ticker = result.company.ticker ? ` (${result.company.ticker})` : '';
  console.log('');
  console.log(`${chalk.green.bold(result.company.name)}${ticker} ${chalk.white(String(result.year))}`);
  console.log(chalk.dim(`  Source: ${result.source.providerId} tier ${result.source.tier}  ${result.source.url ?? result.source.id}`));
  console.log(chalk.dim(`  Snapshot: ${result.snapshotId}  Spans: ${result.spanCount}`));
  console.log('');

  for (const theme of result.themes) {
    const { score, parity } = theme;
    const stage = score.audit
      ? chalk.yellow(`0 (gated from ${score.audit.candidateStage}: ${score.audit.found}/${score.audit.required} quotes)`)
      : chalk.bold(String(score.stage));
    const parityText = parity.verdict === 'pass' ? chalk.green('parity ok') : chalk.red('parity FAIL');
    console.log(
      `  ${chalk.cyan(theme.theme.padEnd(5))} stage ${stage}` +
      chalk.dim(`  confidence ${score.confidence.toFixed(2)}  evidence ${score.evidenceIds.length}  `) +
      parityText,
    );
  }
}

export function printOutcomeSummary(outcome: BatchOutcome): void {
  const { parity } = outcome;
  console.log('');
  const parityLine = `Parity: ${parity.passed}/${parity.total} passed`;
  console.log(parity.failed > 0 ? chalk.red.bold(parityLine) : chalk.green(parityLine));
  for (const query of parity.failingQueries) {
    console.log(chalk.red(`  - ${query}`));
  }
  for (const record of outcome.errors) {
    console.log(chalk.red(`✗ ${record.key}: ${record.error.name}: ${record.error.message}`));
  }
}

/** Print a failure and mark the process as failed. */
export function reportError(err: unknown, json: boolean | undefined): void {
  const error = toError(err);
  process.exitCode = 1;

  if (json) {
    const details = isEngineError(error) ? error.details() : {};
    console.error(JSON.stringify({ error: { name: error.name, message: error.message, details } }));
    return;
  }

  console.error(chalk.red(`${error.name}: ${error.message}`));
  if (error instanceof ConfigError) {
    for (const issue of error.issues) {
      console.error(chalk.dim(`  - ${issue}`));
    }
  }
}

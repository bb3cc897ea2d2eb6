import { Command } from 'commander';
import chalk from 'chalk';
import { BatchRunner, formatBatchJson, type BatchOutcome, type WriteOutputResult } from '@esgrade/core';
import { getConfig, type GlobalOptions } from '../context.js';
import { createRuntime, createWriter, overridesFromOptions } from '../runtime.js';
import { attachReporter, printOutcomeSummary, printUnitResult, reportError } from '../headless.js';
import { buildCompanyRef, parseOutputFormat, parseThemes, parseYear } from './options.js';

interface ScoreOptions {
  ticker?: string;
  cik?: string;
  themes?: string;
  output?: string;
  outputDir?: string;
}

export function registerScoreCommand(program: Command): void {
  program
    .command('score')
    .description('Resolve a report and score one company-year against the rubric')
    .argument('<company>', 'Company name (e.g., "Acme Corp")')
    .argument('<year>', 'Reporting year')
    .option('-t, --ticker <symbol>', 'Ticker symbol')
    .option('--cik <cik>', 'SEC central index key')
    .option('--themes <ids>', 'Comma-separated theme ids (default: all)')
    .option('-o, --output <format>', 'Artifact format (json|markdown|both)')
    .option('--output-dir <dir>', 'Output directory')
    .action(async (name: string, yearArg: string, options: ScoreOptions, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      let spinner: ReturnType<typeof attachReporter>;

      try {
        const company = buildCompanyRef(name, options);
        const year = parseYear(yearArg);
        const format = parseOutputFormat(options.output);

        const runtime = createRuntime(getConfig(), overridesFromOptions(globalOpts));
        spinner = attachReporter(runtime, globalOpts);
        const batch = new BatchRunner(runtime.engine, { concurrency: 1, themes: parseThemes(options.themes) });

        spinner?.start(`Scoring ${chalk.bold(company.name)} ${year}`);
        const outcome = await batch.run([{ company, year }]);
        spinner?.stop();

        const written = createWriter(runtime, { outputDir: options.outputDir, format }).writeBatch(outcome);

        if (globalOpts.json) {
          console.log(formatBatchJson(outcome, runtime.determinism.now()));
        } else {
          for (const result of outcome.results) printUnitResult(result);
          printOutcomeSummary(outcome);
          printWritten(written);
        }

        markFailures(outcome);
      } catch (err) {
        spinner?.fail();
        reportError(err, globalOpts.json);
      }
    });
}

export function printWritten(written: WriteOutputResult): void {
  const paths = [...written.unitPaths, written.summaryPath, written.markdownPath];
  for (const path of paths) {
    if (path) console.log(chalk.dim(`  Output: ${path}`));
  }
}

/** Unit errors and parity failures both fail the run. */
export function markFailures(outcome: BatchOutcome): void {
  if (outcome.errors.length > 0 || outcome.parity.failed > 0) {
    process.exitCode = 1;
  }
}

import { Command } from 'commander';
import { resolve } from 'node:path';
import { BatchRunner, formatBatchJson, type BatchOutcome } from '@esgrade/core';
import { getConfig, type GlobalOptions } from '../context.js';
import { createRuntime, createWriter, overridesFromOptions } from '../runtime.js';
import { attachBatchProgress, attachReporter, printOutcomeSummary, printUnitResult, reportError } from '../headless.js';
import { loadBatchFile } from '../batch-file.js';
import { parseIntegerOption, parseOutputFormat, parseThemes } from './options.js';
import { markFailures, printWritten } from './score.js';

interface BatchOptions {
  concurrency?: string;
  themes?: string;
  output?: string;
  outputDir?: string;
}

export function registerBatchCommand(program: Command): void {
  program
    .command('batch')
    .description('Score every company-year listed in a YAML batch file')
    .argument('<file>', 'Batch file (units: [{company, ticker?, cik?, year | years}])')
    .option('-j, --concurrency <n>', 'Units scored in parallel')
    .option('--themes <ids>', 'Comma-separated theme ids (overrides the file)')
    .option('-o, --output <format>', 'Artifact format (json|markdown|both)')
    .option('--output-dir <dir>', 'Output directory')
    .action(async (file: string, options: BatchOptions, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      let spinner: ReturnType<typeof attachReporter>;

      try {
        const config = getConfig();
        const batchFile = loadBatchFile(resolve(file));
        const concurrency = parseIntegerOption('concurrency', options.concurrency, 1, 64) ?? config.resolution.concurrency;
        const format = parseOutputFormat(options.output);

        const runtime = createRuntime(config, overridesFromOptions(globalOpts));
        spinner = attachReporter(runtime, globalOpts);

        const controller = new AbortController();
        const onSigint = (): void => controller.abort();
        process.once('SIGINT', onSigint);

        const batch = new BatchRunner(runtime.engine, {
          concurrency,
          themes: parseThemes(options.themes) ?? batchFile.themes,
          signal: controller.signal,
        });
        attachBatchProgress(batch, spinner);

        let outcome: BatchOutcome;
        try {
          outcome = await batch.run(batchFile.units);
        } finally {
          process.removeListener('SIGINT', onSigint);
        }

        const written = createWriter(runtime, { outputDir: options.outputDir, format }).writeBatch(outcome);

        if (globalOpts.json) {
          console.log(formatBatchJson(outcome, runtime.determinism.now()));
        } else {
          if (globalOpts.verbose) {
            for (const result of outcome.results) printUnitResult(result);
          }
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

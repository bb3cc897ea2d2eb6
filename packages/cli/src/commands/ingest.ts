import { Command } from 'commander';
import chalk from 'chalk';
import { readFile } from 'node:fs/promises';
import { basename, resolve } from 'node:path';
import {
  InvalidInput,
  companySlug,
  createResolvedDocument,
  createSourceCandidate,
  type TextSpan,
} from '@esgrade/core';
import { contentTypeFor } from '@esgrade/providers';
import { getConfig, type GlobalOptions } from '../context.js';
import { createRuntime, overridesFromOptions } from '../runtime.js';
import { reportError } from '../headless.js';
import { buildCompanyRef, parseYear } from './options.js';

interface IngestOptions {
  ticker?: string;
  publishedAt?: string;
}

export const INGEST_PROVIDER_ID = 'ingest';

export function registerIngestCommand(program: Command): void {
  program
    .command('ingest')
    .description('Extract local report files into the span store without scoring')
    .argument('<company>', 'Company name')
    .argument('<year>', 'Reporting year')
    .argument('<files...>', 'Report files (.html, .txt, .md, .json)')
    .option('-t, --ticker <symbol>', 'Ticker symbol')
    .option('--published-at <date>', 'Publication date (YYYY-MM-DD) used for freshness')
    .action(async (name: string, yearArg: string, files: string[], options: IngestOptions, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();

      try {
        const company = buildCompanyRef(name, options);
        const year = parseYear(yearArg);
        if (options.publishedAt !== undefined && Number.isNaN(Date.parse(options.publishedAt))) {
          throw new InvalidInput(`Invalid --published-at date "${options.publishedAt}"`, 'published-at');
        }

        const runtime = createRuntime(getConfig(), overridesFromOptions(globalOpts));
        const orgId = companySlug(company);
        const spans: TextSpan[] = [];
        const documents: Array<{ path: string; id: string; spans: number }> = [];

        for (const file of files) {
          const path = resolve(file);
          const contentType = contentTypeFor(path);
          if (!contentType) {
            throw new InvalidInput(`Unsupported file type: ${path}`, 'files');
          }

          const candidate = createSourceCandidate({
            providerId: INGEST_PROVIDER_ID,
            tier: 1,
            priorityScore: 0,
            access: 'file',
            contentType,
            title: basename(path),
            attributes: {
              path,
              ...(options.publishedAt !== undefined ? { publishedAt: options.publishedAt } : {}),
            },
          });
          const document = createResolvedDocument(candidate, await readFile(path), runtime.determinism.now());
          const extracted = runtime.extractor.extract(document);
          spans.push(...extracted);
          documents.push({ path, id: document.id, spans: extracted.length });
        }

        await runtime.store.put(orgId, year, spans);
        const stored = await runtime.store.list(orgId, year);

        if (globalOpts.json) {
          console.log(JSON.stringify({ org: orgId, year, documents, stored: stored.length }, null, 2));
          return;
        }

        for (const doc of documents) {
          console.log(`  ${chalk.green('✓')} ${doc.path} ${chalk.dim(`${doc.id}  ${doc.spans} spans`)}`);
        }
        console.log(chalk.dim(`  Store: ${orgId} ${year}, ${stored.length} spans`));
      } catch (err) {
        reportError(err, globalOpts.json);
      }
    });
}

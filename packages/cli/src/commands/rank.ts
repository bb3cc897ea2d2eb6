import { Command } from 'commander';
import chalk from 'chalk';
import { InvalidInput, buildRankPool, companySlug, type RankedResult } from '@esgrade/core';
import { getConfig, type GlobalOptions } from '../context.js';
import { createRuntime, overridesFromOptions } from '../runtime.js';
import { reportError } from '../headless.js';
import { buildCompanyRef, parseIntegerOption, parseUnitOption, parseYear } from './options.js';

interface RankOptions {
  ticker?: string;
  topK?: string;
  alpha?: string;
}

const SNIPPET_LENGTH = 80;

export function registerRankCommand(program: Command): void {
  program
    .command('rank')
    .description('Rank stored spans of a company-year against a free-text query')
    .argument('<company>', 'Company name')
    .argument('<year>', 'Reporting year')
    .argument('<query>', 'Query text')
    .option('-t, --ticker <symbol>', 'Ticker symbol')
    .option('-k, --top-k <n>', 'Number of results')
    .option('--alpha <weight>', 'Lexical weight in fusion, 0..1')
    .action(async (name: string, yearArg: string, query: string, options: RankOptions, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();

      try {
        const config = getConfig();
        const company = buildCompanyRef(name, options);
        const year = parseYear(yearArg);
        const topK = parseIntegerOption('top-k', options.topK, 1) ?? config.ranking.top_k;
        const alpha = parseUnitOption('alpha', options.alpha) ?? config.ranking.alpha;

        const runtime = createRuntime(config, overridesFromOptions(globalOpts));
        const orgId = companySlug(company);
        const spans = await runtime.store.list(orgId, year);
        if (spans.length === 0) {
          throw new InvalidInput(
            `No stored spans for ${orgId} ${year}. Run "esgrade score" or "esgrade ingest" first.`,
            'company',
          );
        }

        const pool = buildRankPool(query, spans, config.ranking.bm25);
        const ranked = runtime.ranker.rank(query, pool, alpha, topK);
        const texts = new Map(pool.map(c => [c.documentId, c.text]));

        if (globalOpts.json) {
          console.log(JSON.stringify({
            org: orgId,
            year,
            query,
            alpha,
            topK,
            semantic: runtime.ranker.semanticModel,
            results: ranked.map(r => ({ ...r, text: texts.get(r.documentId) ?? '' })),
          }, null, 2));
          return;
        }

        console.log(chalk.bold(`${company.name} ${year}`) + chalk.dim(`  "${query}"  alpha ${alpha}  ${spans.length} spans`));
        console.log('');
        for (const result of ranked) {
          printRanked(result, texts.get(result.documentId) ?? '');
        }
      } catch (err) {
        reportError(err, globalOpts.json);
      }
    });
}

function printRanked(result: RankedResult, text: string): void {
  const snippet = text.length > SNIPPET_LENGTH ? `${text.slice(0, SNIPPET_LENGTH - 3)}...` : text;
  console.log(
    `  ${chalk.bold(String(result.rank + 1).padStart(2))}. ${chalk.cyan(result.fusedScore.toFixed(4))}` +
    chalk.dim(`  lex ${result.lexicalScore.toFixed(4)}  sem ${result.semanticScore.toFixed(4)}  ${result.documentId}`),
  );
  console.log(`      ${snippet.replace(/\s+/g, ' ')}`);
}

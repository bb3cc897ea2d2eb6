import { Command } from 'commander';
import chalk from 'chalk';
import { loadRubric, type Rubric } from '@esgrade/core';
import { getConfig, type GlobalOptions } from '../context.js';
import { resolveRubricPath } from '../runtime.js';
import { reportError } from '../headless.js';

export function registerRubricCommand(program: Command): void {
  const rubric = program
    .command('rubric')
    .description('Inspect and validate maturity rubrics');

  rubric
    .command('validate')
    .description('Validate a rubric file (default: the configured rubric)')
    .argument('[path]', 'Path to a rubric YAML file')
    .action(async (path: string | undefined, _options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      try {
        const filePath = resolveRubricPath(getConfig(), path);
        const loaded = loadRubric(filePath);

        if (globalOpts.json) {
          console.log(JSON.stringify({
            valid: true,
            path: filePath,
            name: loaded.name,
            version: loaded.version,
            fingerprint: loaded.fingerprint,
            themes: loaded.themes.map(t => t.id),
          }, null, 2));
          return;
        }

        console.log(chalk.green(`✓ ${loaded.name} v${loaded.version}`) + chalk.dim(`  ${filePath}`));
        console.log(chalk.dim(`  ${loaded.themes.length} themes, fingerprint ${loaded.fingerprint}`));
      } catch (err) {
        reportError(err, globalOpts.json);
      }
    });

  rubric
    .command('show')
    .description('Show themes, queries and stage descriptions')
    .argument('[path]', 'Path to a rubric YAML file')
    .action(async (path: string | undefined, _options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      try {
        const loaded = loadRubric(resolveRubricPath(getConfig(), path));
        if (globalOpts.json) {
          console.log(JSON.stringify(describeRubric(loaded), null, 2));
          return;
        }
        printRubric(loaded);
      } catch (err) {
        reportError(err, globalOpts.json);
      }
    });
}

function describeRubric(rubric: Rubric) {
  return {
    name: rubric.name,
    version: rubric.version,
    fingerprint: rubric.fingerprint,
    themes: rubric.themes.map(theme => ({
      id: theme.id,
      name: theme.name,
      query: theme.query,
      baseline: theme.baseline,
      stages: theme.stages.map(s => ({
        stage: s.stage,
        description: s.description,
        minMatches: s.minMatches,
        signals: s.signals.map(signal => signal.source),
      })),
    })),
  };
}

function printRubric(rubric: Rubric): void {
  console.log(chalk.bold(`${rubric.name} v${rubric.version}`));
  for (const theme of rubric.themes) {
    console.log('');
    console.log(`${chalk.cyan(theme.id)}  ${chalk.bold(theme.name)}`);
    console.log(chalk.dim(`  query: ${theme.query}`));
    console.log(`  0  ${theme.baseline}`);
    for (const stage of theme.stages) {
      console.log(`  ${stage.stage}  ${stage.description}` + chalk.dim(`  (${stage.signals.length} signals)`));
    }
  }
}

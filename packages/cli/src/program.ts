import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfigWithMeta } from './config/index.js';
import { setConfig, type GlobalOptions } from './context.js';
import { registerScoreCommand } from './commands/score.js';
import { registerBatchCommand } from './commands/batch.js';
import { registerRankCommand } from './commands/rank.js';
import { registerIngestCommand } from './commands/ingest.js';
import { registerRubricCommand } from './commands/rubric.js';
import { registerConfigCommand } from './commands/config.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('esgrade')
    .description('Evidence-gated ESG maturity scoring from public reports')
    .version(VERSION)
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Machine-readable JSON output')
    .option('-c, --config <path>', 'Path to config file')
    .option('--deterministic', 'Fixed clock and seeded randomness')
    .option('--fixed-time <unix>', 'Clock value in unix seconds (deterministic mode)')
    .option('--seed <n>', 'Random seed (deterministic mode)');

  registerScoreCommand(program);
  registerBatchCommand(program);
  registerRankCommand(program);
  registerIngestCommand(program);
  registerRubricCommand(program);
  registerConfigCommand(program);

  program.hook('preAction', (_thisCommand, actionCommand) => {
    const chain = getCommandChain(actionCommand, program);

    // Skip config loading for 'config init'
    if (chain[0] === 'config' && chain[1] === 'init') {
      return;
    }

    const opts = actionCommand.optsWithGlobals<GlobalOptions>();
    const { config, configFileExists, envKeysUsed } = loadConfigWithMeta({ configPath: opts.config });

    if (!configFileExists && envKeysUsed.length > 0 && !opts.json) {
      console.error(chalk.cyan(`  Using ${envKeysUsed.join(', ')} from environment.`));
      console.error(chalk.dim(`  Run "esgrade config init" to create a config file for more options.\n`));
    }

    setConfig(config);
  });

  return program;
}

function getCommandChain(cmd: Command, root: Command): string[] {
  const chain: string[] = [];
  let current: Command | null = cmd;
  while (current && current !== root) {
    chain.unshift(current.name());
    current = current.parent;
  }
  return chain;
}

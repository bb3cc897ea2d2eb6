import chalk from 'chalk';
import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, resolve } from 'node:path';

export interface InitCommandOptions {
  configPath?: string;
  homeDir?: string;
  logger?: (...args: unknown[]) => void;
}

function expandTilde(pathValue: string, homeDirectory: string): string {
  if (pathValue === '~') {
    return homeDirectory;
  }
  if (pathValue.startsWith('~/')) {
    return resolve(homeDirectory, pathValue.slice(2));
  }
  return pathValue;
}

function resolveConfigPath(configPath: string | undefined, homeDirectory: string): string {
  if (configPath) {
    return expandTilde(configPath, homeDirectory);
  }
  return resolve(homeDirectory, '.esgrade', 'config.yaml');
}

export const CONFIG_TEMPLATE = `# esgrade configuration

# Reproducible runs: fixed clock and seeded randomness.
# ESGRADE_DETERMINISTIC, FIXED_TIME and SEED set these from the environment.
determinism:
  enabled: false
  # fixed_time: 1700000000   # unix seconds
  # seed: 42

ranking:
  alpha: 0.5                   # lexical weight in fusion, 0..1
  top_k: 8
  semantic: hashed_embedding   # hashed_embedding | token_overlap
  bm25:
    k1: 1.2
    b: 0.75

scoring:
  # rubric_path: ~/.esgrade/rubrics/custom.yaml   # default: bundled rubric
  min_quotes: 2
  max_quote_words: 30
  max_quotes_per_document: 3
  freshness:
    - { months: 24, penalty: 0.1 }
    - { months: 36, penalty: 0.2 }
    - { months: 48, penalty: 0.3 }
  strict_parity: false

resolution:
  provider_timeout_ms: 30000
  concurrency: 4
  max_retries: 2
  # SEC asks for a contact address in the User-Agent.
  # Use "env:ESGRADE_USER_AGENT" or "$ESGRADE_USER_AGENT" to read from env
  user_agent: env:ESGRADE_USER_AGENT

# Report sources. Tier 1 is tried first; within a tier, lower priority wins.
providers:
  sec_edgar:
    enabled: true
    forms: ["10-K"]
  local:
    root: "~/.esgrade/reports"   # <root>/<company-slug>/<year>/*
  # company_ir:
  #   reports:
  #     ACME: ["https://investors.acme.example/reports/{year}/sustainability.html"]
  # web_report:
  #   templates:
  #     - "https://reports.example.org/{slug}/{year}.html"

storage:
  data_dir: "~/.esgrade/data"

output:
  dir: "./output"
  format: json                 # json | markdown | both
  filename_template: "{org}-{year}"
`;

export async function initCommand(options: InitCommandOptions = {}): Promise<void> {
  const log = options.logger ?? console.log;
  const homeDirectory = options.homeDir ?? homedir();

  const configPath = resolveConfigPath(options.configPath, homeDirectory);
  const configDir = dirname(configPath);
  const reportsDir = resolve(homeDirectory, '.esgrade', 'reports');

  if (!existsSync(configDir)) {
    mkdirSync(configDir, { recursive: true });
    log(chalk.green('Created directory:'), configDir);
  }

  if (!existsSync(reportsDir)) {
    mkdirSync(reportsDir, { recursive: true });
    log(chalk.green('Created directory:'), reportsDir);
  }

  if (existsSync(configPath)) {
    log(chalk.yellow('Config already exists at:'), configPath);
    log(chalk.yellow('Run with --config <path> to use a different location.'));
    return;
  }

  writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
  log(chalk.green('Created config file:'), configPath);
  log('');
  log(chalk.cyan('Next steps:'));
  log('  1. Edit', configPath);
  log('  2. Set ESGRADE_USER_AGENT to "your-app your@email" for SEC EDGAR');
  log('  3. Run', chalk.green('esgrade score "Acme Corp" 2023 --ticker ACME'));
}

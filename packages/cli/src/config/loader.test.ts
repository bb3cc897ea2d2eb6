import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { writeFileSync, mkdtempSync, rmSync, readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { resolve } from 'node:path';
import { ConfigError } from '@esgrade/core';
import { loadConfig, loadConfigWithMeta, setConfigValue } from './loader.js';

let testDir = '';
let testConfigPath = '';

function writeConfig(content: string): void {
  writeFileSync(testConfigPath, content, 'utf-8');
}

describe('config loader', () => {
  beforeEach(() => {
    testDir = mkdtempSync(resolve(tmpdir(), 'esgrade-config-'));
    testConfigPath = resolve(testDir, 'config.yaml');
    vi.stubEnv('ESGRADE_DETERMINISTIC', '');
    vi.stubEnv('FIXED_TIME', '');
    vi.stubEnv('SEED', '');
    vi.stubEnv('ESGRADE_USER_AGENT', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(testDir, { recursive: true, force: true });
  });

  it('returns defaults when no config file exists', () => {
    const config = loadConfig({ configPath: testConfigPath });

    expect(config.determinism).toEqual({ enabled: false });
    expect(config.ranking).toEqual({ alpha: 0.5, top_k: 8, semantic: 'hashed_embedding', bm25: { k1: 1.2, b: 0.75 } });
    expect(config.scoring.min_quotes).toBe(2);
    expect(config.scoring.rubric_path).toBe('');
    expect(config.resolution.concurrency).toBe(4);
    expect(config.resolution.user_agent).toBeUndefined();
    expect(Object.keys(config.providers)).toEqual(['sec_edgar', 'local']);
    expect(config.output).toEqual({ dir: './output', format: 'json', filename_template: '{org}-{year}' });
  });

  it('merges sections over the defaults', () => {
    writeConfig(`
ranking:
  alpha: 0.7
  bm25:
    k1: 1.5
scoring:
  strict_parity: true
output:
  format: both
`);

    const config = loadConfig({ configPath: testConfigPath });

    expect(config.ranking.alpha).toBe(0.7);
    expect(config.ranking.top_k).toBe(8);
    expect(config.ranking.bm25).toEqual({ k1: 1.5, b: 0.75 });
    expect(config.scoring.strict_parity).toBe(true);
    expect(config.scoring.min_quotes).toBe(2);
    expect(config.output.format).toBe('both');
    expect(config.output.dir).toBe('./output');
  });

  it('replaces the provider set when providers are configured', () => {
    writeConfig(`
providers:
  web_report:
    templates: ["https://reports.example.org/{slug}/{year}.html"]
`);

    const config = loadConfig({ configPath: testConfigPath });

    expect(config.providers).toEqual({
      web_report: {
        enabled: true,
        priority_offset: 0,
        templates: ['https://reports.example.org/{slug}/{year}.html'],
      },
    });
  });

  it('stores numeric seeds as decimal strings', () => {
    writeConfig('determinism:\n  enabled: true\n  seed: 42\n');

    const config = loadConfig({ configPath: testConfigPath });

    expect(config.determinism).toEqual({ enabled: true, seed: '42' });
  });

  it('resolves env: prefix from environment variable', () => {
    vi.stubEnv('TEST_ESGRADE_UA', 'test-agent admin@example.com');
    writeConfig('resolution:\n  user_agent: env:TEST_ESGRADE_UA\n');

    const config = loadConfig({ configPath: testConfigPath });

    expect(config.resolution.user_agent).toBe('test-agent admin@example.com');
  });

  it('resolves ${VAR} from environment variable', () => {
    vi.stubEnv('TEST_ESGRADE_DATA', '/srv/esgrade');
    writeConfig('storage:\n  data_dir: ${TEST_ESGRADE_DATA}\n');

    const config = loadConfig({ configPath: testConfigPath });

    expect(config.storage.data_dir).toBe('/srv/esgrade');
  });

  it('clears unresolved env refs and falls back to ESGRADE_USER_AGENT', () => {
    writeConfig('resolution:\n  user_agent: env:ESGRADE_TEST_MISSING\n');

    expect(loadConfig({ configPath: testConfigPath }).resolution.user_agent).toBeUndefined();

    vi.stubEnv('ESGRADE_USER_AGENT', 'fallback-agent');
    const result = loadConfigWithMeta({ configPath: testConfigPath });
    expect(result.config.resolution.user_agent).toBe('fallback-agent');
    expect(result.envKeysUsed).toEqual(['ESGRADE_USER_AGENT']);
  });

  it('does not override an explicit user agent with the env var', () => {
    vi.stubEnv('ESGRADE_USER_AGENT', 'fallback-agent');
    writeConfig('resolution:\n  user_agent: configured-agent\n');

    const result = loadConfigWithMeta({ configPath: testConfigPath });

    expect(result.config.resolution.user_agent).toBe('configured-agent');
    expect(result.envKeysUsed).toEqual([]);
  });

  it('reads determinism settings from the environment', () => {
    vi.stubEnv('ESGRADE_DETERMINISTIC', '1');
    vi.stubEnv('FIXED_TIME', '1700000000');
    vi.stubEnv('SEED', '7');

    const result = loadConfigWithMeta({ configPath: testConfigPath });

    expect(result.config.determinism).toEqual({ enabled: true, fixed_time: 1700000000, seed: '7' });
    expect(result.envKeysUsed).toEqual(['ESGRADE_DETERMINISTIC', 'FIXED_TIME', 'SEED']);
    expect(result.configFileExists).toBe(false);
  });

  it('lets the config file win over determinism env vars', () => {
    vi.stubEnv('SEED', '7');
    writeConfig('determinism:\n  seed: "99"\n');

    const config = loadConfig({ configPath: testConfigPath });

    expect(config.determinism.seed).toBe('99');
  });

  it('rejects invalid config with zod validation errors', () => {
    writeConfig('ranking:\n  alpha: 2\n');

    expect(() => loadConfig({ configPath: testConfigPath })).toThrow(ConfigError);
    expect(() => loadConfig({ configPath: testConfigPath }))
      .toThrow('Invalid config: ranking.alpha: Number must be less than or equal to 1');
  });

  it('rejects unknown sections', () => {
    writeConfig('skills_dir: ~/skills\n');

    expect(() => loadConfig({ configPath: testConfigPath }))
      .toThrow("Invalid config: : Unrecognized key(s) in object: 'skills_dir'");
  });

  it('rejects freshness thresholds out of order', () => {
    writeConfig('scoring:\n  freshness:\n    - { months: 36, penalty: 0.2 }\n    - { months: 24, penalty: 0.1 }\n');

    expect(() => loadConfig({ configPath: testConfigPath }))
      .toThrow('scoring.freshness.1.months: Freshness thresholds must be in increasing order of months');
  });

  it('throws ConfigError when YAML is invalid', () => {
    writeConfig('ranking: [unclosed\n');

    expect(() => loadConfig({ configPath: testConfigPath })).toThrow(/Failed to parse config file/);
  });

  it('treats an empty file as defaults', () => {
    writeConfig('');

    const result = loadConfigWithMeta({ configPath: testConfigPath });

    expect(result.configFileExists).toBe(true);
    expect(result.config.ranking.alpha).toBe(0.5);
  });

  describe('setConfigValue', () => {
    it('sets a numeric value and keeps comments', () => {
      writeConfig('# tuned for recall\nranking:\n  alpha: 0.5\n');

      setConfigValue('ranking.alpha', '0.3', { configPath: testConfigPath });

      expect(readFileSync(testConfigPath, 'utf-8')).toBe('# tuned for recall\nranking:\n  alpha: 0.3\n');
      expect(loadConfig({ configPath: testConfigPath }).ranking.alpha).toBe(0.3);
    });

    it('creates nested keys', () => {
      writeConfig('ranking:\n  alpha: 0.5\n');

      setConfigValue('output.format', 'markdown', { configPath: testConfigPath });

      expect(loadConfig({ configPath: testConfigPath }).output.format).toBe('markdown');
    });

    it('coerces booleans', () => {
      writeConfig('');

      setConfigValue('scoring.strict_parity', 'true', { configPath: testConfigPath });

      expect(loadConfig({ configPath: testConfigPath }).scoring.strict_parity).toBe(true);
    });

    it('rejects values that fail validation and leaves the file alone', () => {
      writeConfig('ranking:\n  alpha: 0.5\n');

      expect(() => setConfigValue('ranking.top_k', '0', { configPath: testConfigPath }))
        .toThrow('Invalid config after setting ranking.top_k');
      expect(readFileSync(testConfigPath, 'utf-8')).toBe('ranking:\n  alpha: 0.5\n');
    });

    it('throws when config file does not exist', () => {
      expect(() => setConfigValue('ranking.alpha', '0.2', { configPath: resolve(testDir, 'missing.yaml') }))
        .toThrow(/Config file not found/);
    });
  });
});

import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { resolve } from 'node:path';
import { parse } from 'yaml';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigSchema } from '../config/index.js';
import { CONFIG_TEMPLATE, initCommand } from './init.js';

describe('initCommand', () => {
  let testHomeDir = '';

  beforeEach(() => {
    testHomeDir = mkdtempSync(resolve(tmpdir(), 'esgrade-init-'));
  });

  afterEach(() => {
    if (testHomeDir && existsSync(testHomeDir)) {
      rmSync(testHomeDir, { recursive: true, force: true });
    }
  });

  it('uses the provided config path override', async () => {
    const customConfigPath = resolve(testHomeDir, 'custom', 'config.yaml');

    await initCommand({
      homeDir: testHomeDir,
      configPath: customConfigPath,
      logger: () => undefined,
    });

    expect(readFileSync(customConfigPath, 'utf-8')).toBe(CONFIG_TEMPLATE);
    expect(existsSync(resolve(testHomeDir, '.esgrade', 'reports'))).toBe(true);
  });

  it('leaves an existing config untouched', async () => {
    const configDir = resolve(testHomeDir, '.esgrade');
    const configPath = resolve(configDir, 'config.yaml');

    mkdirSync(configDir, { recursive: true });
    writeFileSync(configPath, 'ranking:\n  alpha: 0.7\n', 'utf-8');

    await initCommand({
      homeDir: testHomeDir,
      logger: () => undefined,
    });

    expect(existsSync(resolve(testHomeDir, '.esgrade', 'reports'))).toBe(true);
    expect(readFileSync(configPath, 'utf-8')).toBe('ranking:\n  alpha: 0.7\n');
  });

  it('writes a template that validates', () => {
    const result = ConfigSchema.safeParse(parse(CONFIG_TEMPLATE));
    expect(result.success).toBe(true);
  });
});

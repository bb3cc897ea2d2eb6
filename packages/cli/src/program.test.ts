import { describe, it, expect } from 'vitest';
import type { Command } from 'commander';
import { createProgram } from './program.js';

function findCommand(parent: Command, name: string): Command {
  const cmd = parent.commands.find(c => c.name() === name);
  if (!cmd) throw new Error(`command ${name} not registered`);
  return cmd;
}

describe('CLI command structure', () => {
  it('creates a program with the correct name', () => {
    const program = createProgram();
    expect(program.name()).toBe('esgrade');
  });

  it('registers all top-level commands', () => {
    const program = createProgram();
    const names = program.commands.map(c => c.name());
    expect(names).toEqual(['score', 'batch', 'rank', 'ingest', 'rubric', 'config']);
  });

  it('has all global options', () => {
    const program = createProgram();
    const optLongs = program.options.map(o => o.long);
    expect(optLongs).toEqual([
      '--version',
      '--verbose',
      '--json',
      '--config',
      '--deterministic',
      '--fixed-time',
      '--seed',
    ]);
  });

  describe('score command', () => {
    it('takes company and year', () => {
      const cmd = findCommand(createProgram(), 'score');
      expect(cmd.registeredArguments.map(a => [a.name(), a.required])).toEqual([
        ['company', true],
        ['year', true],
      ]);
    });

    it('has all options', () => {
      const cmd = findCommand(createProgram(), 'score');
      const optLongs = cmd.options.map(o => o.long);
      expect(optLongs).toEqual(['--ticker', '--cik', '--themes', '--output', '--output-dir']);
    });

    it('generates help text', () => {
      const help = findCommand(createProgram(), 'score').helpInformation();
      expect(help).toContain('score [options] <company> <year>');
      expect(help).toContain('--themes <ids>');
    });
  });

  describe('batch command', () => {
    it('takes a batch file', () => {
      const cmd = findCommand(createProgram(), 'batch');
      expect(cmd.registeredArguments.map(a => a.name())).toEqual(['file']);
      expect(cmd.options.map(o => o.long)).toContain('--concurrency');
    });
  });

  describe('rank command', () => {
    it('takes company, year and query', () => {
      const cmd = findCommand(createProgram(), 'rank');
      expect(cmd.registeredArguments.map(a => a.name())).toEqual(['company', 'year', 'query']);
      expect(cmd.options.map(o => o.long)).toEqual(['--ticker', '--top-k', '--alpha']);
    });
  });

  describe('ingest command', () => {
    it('has a variadic files argument', () => {
      const cmd = findCommand(createProgram(), 'ingest');
      const files = cmd.registeredArguments[2];
      expect(files.name()).toBe('files');
      expect(files.variadic).toBe(true);
    });
  });

  describe('rubric subcommands', () => {
    it('registers validate and show with an optional path', () => {
      const rubric = findCommand(createProgram(), 'rubric');
      expect(rubric.commands.map(c => c.name())).toEqual(['validate', 'show']);
      for (const sub of rubric.commands) {
        expect(sub.registeredArguments[0].required).toBe(false);
      }
    });
  });

  describe('config subcommands', () => {
    it('registers init, show and set', () => {
      const config = findCommand(createProgram(), 'config');
      expect(config.commands.map(c => c.name())).toEqual(['init', 'show', 'set']);
    });

    it('set takes key and value', () => {
      const set = findCommand(findCommand(createProgram(), 'config'), 'set');
      expect(set.registeredArguments.map(a => a.name())).toEqual(['key', 'value']);
    });
  });
});

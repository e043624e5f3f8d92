import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Command } from 'commander';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { resolve } from 'path';
import { tmpdir } from 'os';
import { createProgram, getCommandChain } from './program.js';
import { getConfig, resetConfig } from './context.js';

function findCommand(parent: Command, name: string): Command {
  const cmd = parent.commands.find(c => c.name() === name);
  if (!cmd) throw new Error(`Command not registered: ${name}`);
  return cmd;
}

describe('CLI command structure', () => {
  it('creates a program with correct name', () => {
    const program = createProgram();
    expect(program.name()).toBe('starsift');
  });

  it('registers all top-level commands', () => {
    const program = createProgram();
    expect(program.commands.map(c => c.name())).toEqual(['run', 'analyze', 'memory', 'config']);
  });

  it('has all global options', () => {
    const program = createProgram();
    expect(program.options.map(o => o.long)).toEqual(['--version', '--verbose', '--json', '--config']);
  });

  describe('run command', () => {
    it('has all options', () => {
      const run = findCommand(createProgram(), 'run');
      expect(run.options.map(o => o.long)).toEqual([
        '--iterations',
        '--interval',
        '--sources',
        '--threshold',
        '--demo',
      ]);
    });

    it('defaults to a single iteration two seconds apart', () => {
      const run = findCommand(createProgram(), 'run');
      expect(run.opts()).toEqual({ iterations: 1, interval: 2 });
    });
  });

  describe('analyze command', () => {
    it('has a required file argument', () => {
      const analyze = findCommand(createProgram(), 'analyze');
      expect(analyze.registeredArguments).toHaveLength(1);
      expect(analyze.registeredArguments[0].name()).toBe('file');
      expect(analyze.registeredArguments[0].required).toBe(true);
    });

    it('generates help text', () => {
      const help = findCommand(createProgram(), 'analyze').helpInformation();
      expect(help).toContain('--text');
      expect(help).toContain('--threshold');
    });
  });

  describe('memory subcommands', () => {
    it('has list, search and compact subcommands', () => {
      const memory = findCommand(createProgram(), 'memory');
      expect(memory.commands.map(c => c.name())).toEqual(['list', 'search', 'compact']);
    });

    it('search requires a text argument', () => {
      const search = findCommand(findCommand(createProgram(), 'memory'), 'search');
      expect(search.registeredArguments.map(a => a.name())).toEqual(['text']);
    });
  });

  describe('config subcommands', () => {
    it('has init, show, and set subcommands', () => {
      const config = findCommand(createProgram(), 'config');
      expect(config.commands.map(c => c.name())).toEqual(['init', 'show', 'set']);
    });

    it('set requires key and value arguments', () => {
      const set = findCommand(findCommand(createProgram(), 'config'), 'set');
      expect(set.registeredArguments.map(a => a.name())).toEqual(['key', 'value']);
    });
  });

  it('builds the command chain below the root', () => {
    const program = createProgram();
    const compact = findCommand(findCommand(program, 'memory'), 'compact');
    expect(getCommandChain(compact, program)).toEqual(['memory', 'compact']);
  });
});

describe('CLI actions', () => {
  let dir: string;
  let configPath: string;
  let stdout: string[];

  beforeEach(() => {
    dir = mkdtempSync(resolve(tmpdir(), 'starsift-cli-'));
    configPath = resolve(dir, 'config.yaml');
    stdout = [];
    for (const key of ['GEMINI_API_KEY', 'GOOGLE_API_KEY', 'NASA_API_KEY', 'NASA_DEMO_MODE', 'ARXIV_DEMO_MODE']) {
      vi.stubEnv(key, '');
    }
    vi.spyOn(console, 'log').mockImplementation((line: unknown) => {
      stdout.push(String(line));
    });
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    resetConfig();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    rmSync(dir, { recursive: true, force: true });
    process.exitCode = undefined;
  });

  async function cli(...args: string[]): Promise<void> {
    await createProgram().parseAsync(['node', 'starsift', '--json', '-c', configPath, ...args]);
  }

  it('loads the config before running an action', async () => {
    writeFileSync(configPath, 'scoring:\n  threshold: 7\n');

    await cli('analyze', '--text', 'Too short.');

    expect(getConfig().scoring.threshold).toBe(7);
  });

  it('prints the analysis of literal text as JSON', async () => {
    await cli('analyze', '--text', 'Too short.');

    expect(stdout).toHaveLength(1);
    const result = JSON.parse(stdout[0]);
    expect(result.analysis.wordCount).toBe(2);
    expect(result.evaluation.score).toBe(-2);
    expect(result.evaluation.passed).toBe(false);
  });

  it('sets the exit code for a missing input file', async () => {
    await cli('analyze', resolve(dir, 'missing.txt'));

    expect(stdout).toEqual([]);
    expect(process.exitCode).toBe(1);
  });

  it('lists an empty memory', async () => {
    writeFileSync(configPath, `storage:\n  memory_path: ${resolve(dir, 'memory.json')}\n`);

    await cli('memory', 'list');

    expect(stdout.map(line => JSON.parse(line))).toEqual([[]]);
  });

  it('masks API keys in config show', async () => {
    vi.stubEnv('GEMINI_API_KEY', 'test-secret');

    await cli('config', 'show');

    const shown = JSON.parse(stdout[0]);
    expect(shown.summarizer.api_key).toBe('********');
    expect(shown.sources.nasa.api_key).toBeUndefined();
  });
});

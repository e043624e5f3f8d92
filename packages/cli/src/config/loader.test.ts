import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { loadConfig, loadConfigWithMeta, setConfigValue, getConfigPath, ConfigError } from './loader.js';
import { writeFileSync, readFileSync, mkdtempSync, rmSync } from 'fs';
import { resolve } from 'path';
import { homedir, tmpdir } from 'os';
import { parse } from 'yaml';

const ENV_KEYS = ['GEMINI_API_KEY', 'GOOGLE_API_KEY', 'NASA_API_KEY', 'NASA_DEMO_MODE', 'ARXIV_DEMO_MODE'];

describe('config loader', () => {
  let testDir: string;
  let testConfigPath: string;

  beforeEach(() => {
    testDir = mkdtempSync(resolve(tmpdir(), 'starsift-config-'));
    testConfigPath = resolve(testDir, 'config.yaml');
    for (const key of ENV_KEYS) {
      vi.stubEnv(key, '');
    }
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(testDir, { recursive: true, force: true });
  });

  it('returns defaults when no config file exists', () => {
    const config = loadConfig({ configPath: testConfigPath });

    expect(config.analysis.min_claim_length).toBe(30);
    expect(config.analysis.max_snippet_chars).toBe(400);
    expect(config.analysis.keywords).toContain('exoplanet');
    expect(config.scoring.threshold).toBe(3.0);
    expect(config.scoring.weights).toEqual({
      keyword: 2.0,
      numeric_bonus: 3.0,
      length_bonus: 1.0,
      claim_bonus: 1.5,
    });
    expect(config.sources.enabled).toEqual(['local', 'arxiv', 'nasa_apod']);
    expect(config.sources.samples_dir).toBe('data/samples');
    expect(config.sources.arxiv).toEqual({ demo_mode: false, query: 'all:exoplanet', max_results: 5 });
    expect(config.sources.nasa.mission).toBe('JWST');
    expect(config.summarizer.model).toBe('gemini-2.5-flash');
    expect(config.summarizer.api_key).toBeUndefined();
    expect(config.storage).toEqual({ memory_path: 'data/memory.json', output_dir: 'data/demo_outputs' });
  });

  it('does not share state between loads', () => {
    const first = loadConfig({ configPath: testConfigPath });
    first.scoring.weights.keyword = 99;
    first.sources.enabled.push('nasa_mission');

    const second = loadConfig({ configPath: testConfigPath });
    expect(second.scoring.weights.keyword).toBe(2.0);
    expect(second.sources.enabled).toEqual(['local', 'arxiv', 'nasa_apod']);
  });

  it('loads and merges custom config', () => {
    writeFileSync(testConfigPath, `
scoring:
  threshold: 5
  weights:
    keyword: 4
sources:
  enabled: [local]
  arxiv:
    max_results: 10
storage:
  output_dir: out
`);

    const config = loadConfig({ configPath: testConfigPath });

    expect(config.scoring.threshold).toBe(5);
    expect(config.scoring.weights.keyword).toBe(4);
    expect(config.scoring.weights.claim_bonus).toBe(1.5);
    expect(config.sources.enabled).toEqual(['local']);
    expect(config.sources.arxiv).toEqual({ demo_mode: false, query: 'all:exoplanet', max_results: 10 });
    expect(config.storage).toEqual({ memory_path: 'data/memory.json', output_dir: 'out' });
  });

  it('treats an empty file as defaults', () => {
    writeFileSync(testConfigPath, '# nothing here\n');

    const { config, configFileExists } = loadConfigWithMeta({ configPath: testConfigPath });

    expect(configFileExists).toBe(true);
    expect(config.scoring.threshold).toBe(3.0);
  });

  it('resolves env: prefix from environment variable', () => {
    writeFileSync(testConfigPath, `
summarizer:
  api_key: env:TEST_GEMINI
`);
    vi.stubEnv('TEST_GEMINI', 'test-key');

    expect(loadConfig({ configPath: testConfigPath }).summarizer.api_key).toBe('test-key');
  });

  it('resolves $ prefix from environment variable', () => {
    writeFileSync(testConfigPath, `
sources:
  nasa:
    api_key: $TEST_NASA
`);
    vi.stubEnv('TEST_NASA', 'test-nasa-key');

    expect(loadConfig({ configPath: testConfigPath }).sources.nasa.api_key).toBe('test-nasa-key');
  });

  it('resolves ${VAR} from environment variable', () => {
    writeFileSync(testConfigPath, `
storage:
  output_dir: \${TEST_OUTPUT}
`);
    vi.stubEnv('TEST_OUTPUT', '/tmp/runs');

    expect(loadConfig({ configPath: testConfigPath }).storage.output_dir).toBe('/tmp/runs');
  });

  it('clears unresolved env: refs and treats them as unset', () => {
    writeFileSync(testConfigPath, `
summarizer:
  api_key: env:NONEXISTENT_VAR
sources:
  nasa:
    api_key: $ALSO_MISSING
`);

    const config = loadConfig({ configPath: testConfigPath });

    expect(config.summarizer.api_key).toBeUndefined();
    expect(config.sources.nasa.api_key).toBeUndefined();
  });

  it('rejects invalid config with zod validation errors', () => {
    writeFileSync(testConfigPath, `
sources:
  enabled: [local, twitter]
`);

    expect(() => loadConfig({ configPath: testConfigPath })).toThrow(ConfigError);
    expect(() => loadConfig({ configPath: testConfigPath })).toThrow(/^Invalid config: sources\.enabled\.1: /);
  });

  it('rejects unknown keys', () => {
    writeFileSync(testConfigPath, `
scoring:
  treshold: 2
`);

    expect(() => loadConfig({ configPath: testConfigPath })).toThrow(ConfigError);
  });

  it('throws ConfigError when YAML is invalid', () => {
    writeFileSync(testConfigPath, `
invalid: yaml: content: [
`);

    expect(() => loadConfig({ configPath: testConfigPath })).toThrow(
      `Failed to parse config file: ${testConfigPath}`,
    );
  });

  it('expands ~ in configPath override', () => {
    expect(getConfigPath('~/.starsift-test/config.yaml')).toBe(resolve(homedir(), '.starsift-test/config.yaml'));
    expect(getConfigPath()).toBe(resolve(homedir(), '.starsift/config.yaml'));
  });

  describe('environment fallbacks', () => {
    it('picks up GEMINI_API_KEY and NASA_API_KEY without a config file', () => {
      vi.stubEnv('GEMINI_API_KEY', 'test-gemini');
      vi.stubEnv('NASA_API_KEY', 'test-nasa');

      const { config, configFileExists, envKeysUsed } = loadConfigWithMeta({ configPath: testConfigPath });

      expect(configFileExists).toBe(false);
      expect(config.summarizer.api_key).toBe('test-gemini');
      expect(config.sources.nasa.api_key).toBe('test-nasa');
      expect(envKeysUsed).toEqual(['GEMINI_API_KEY', 'NASA_API_KEY']);
    });

    it('falls back to GOOGLE_API_KEY', () => {
      vi.stubEnv('GOOGLE_API_KEY', 'test-google');

      const { config, envKeysUsed } = loadConfigWithMeta({ configPath: testConfigPath });

      expect(config.summarizer.api_key).toBe('test-google');
      expect(envKeysUsed).toEqual(['GOOGLE_API_KEY']);
    });

    it('prefers a key from the config file', () => {
      writeFileSync(testConfigPath, `
summarizer:
  api_key: test-file-key
`);
      vi.stubEnv('GEMINI_API_KEY', 'test-gemini');

      const { config, envKeysUsed } = loadConfigWithMeta({ configPath: testConfigPath });

      expect(config.summarizer.api_key).toBe('test-file-key');
      expect(envKeysUsed).toEqual([]);
    });

    it('reads demo switches from the environment', () => {
      vi.stubEnv('NASA_DEMO_MODE', 'Yes');
      vi.stubEnv('ARXIV_DEMO_MODE', '1');

      const config = loadConfig({ configPath: testConfigPath });

      expect(config.sources.nasa.demo_mode).toBe(true);
      expect(config.sources.arxiv.demo_mode).toBe(true);
    });

    it('lets a falsy demo switch override the file', () => {
      writeFileSync(testConfigPath, `
sources:
  nasa:
    demo_mode: true
`);
      vi.stubEnv('NASA_DEMO_MODE', 'off');

      expect(loadConfig({ configPath: testConfigPath }).sources.nasa.demo_mode).toBe(false);
    });
  });

  describe('setConfigValue', () => {
    it('sets nested values with type coercion', () => {
      writeFileSync(testConfigPath, 'scoring:\n  threshold: 3\n');

      setConfigValue('scoring.threshold', '4.5', { configPath: testConfigPath });
      setConfigValue('sources.arxiv.demo_mode', 'true', { configPath: testConfigPath });
      setConfigValue('sources.enabled', 'local, nasa_apod', { configPath: testConfigPath });
      setConfigValue('sources.nasa.mission', 'Hubble', { configPath: testConfigPath });

      expect(parse(readFileSync(testConfigPath, 'utf-8'))).toEqual({
        scoring: { threshold: 4.5 },
        sources: {
          arxiv: { demo_mode: true },
          enabled: ['local', 'nasa_apod'],
          nasa: { mission: 'Hubble' },
        },
      });
    });

    it('rejects values that fail validation and leaves the file alone', () => {
      writeFileSync(testConfigPath, 'scoring:\n  threshold: 3\n');

      expect(() => setConfigValue('scoring.threshold', 'high', { configPath: testConfigPath })).toThrow(
        /^Invalid config after setting scoring\.threshold: /,
      );
      expect(readFileSync(testConfigPath, 'utf-8')).toBe('scoring:\n  threshold: 3\n');
    });

    it('requires an existing config file', () => {
      expect(() => setConfigValue('scoring.threshold', '2', { configPath: testConfigPath })).toThrow(
        `Config file not found: ${testConfigPath}. Run 'starsift config init' first.`,
      );
    });
  });
});

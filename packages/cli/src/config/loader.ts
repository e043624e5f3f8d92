import { readFileSync, existsSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { resolve } from 'path';
import { parse, stringify } from 'yaml';
import { ConfigSchema, ConfigDefaults, type RawConfig, type Config } from './schema.js';

const DEFAULT_CONFIG_PATH = '.starsift/config.yaml';

const TRUTHY_ENV_VALUES = new Set(['1', 'true', 'yes']);

function getDefaultConfigPath(): string {
  return resolve(homedir(), DEFAULT_CONFIG_PATH);
}

export function expandTilde(path: string): string {
  if (path.startsWith('~/') || path === '~') {
    return resolve(homedir(), path.slice(2));
  }
  return path;
}

function resolveEnvVar(value: string): string {
  let envKey: string | undefined;
  if (value.startsWith('env:')) {
    envKey = value.slice(4);
  } else if (value.startsWith('${') && value.endsWith('}')) {
    envKey = value.slice(2, -1);
  } else if (value.startsWith('$')) {
    envKey = value.slice(1);
  }
  if (envKey === undefined) return value;
  const envVal = process.env[envKey];
  return envVal ? envVal : value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stripNullValues(obj: unknown): unknown {
  if (obj === null || obj === undefined) {
    return undefined;
  }
  if (Array.isArray(obj)) {
    return obj.filter(item => item !== null).map(stripNullValues);
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (value !== null) {
        result[key] = stripNullValues(value);
      }
    }
    return result;
  }
  return obj;
}

function resolveEnvVarsInObject(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return resolveEnvVar(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(resolveEnvVarsInObject);
  }
  if (isRecord(obj)) {
    const resolved: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      resolved[key] = resolveEnvVarsInObject(value);
    }
    return resolved;
  }
  return obj;
}

export interface LoadConfigOptions {
  configPath?: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function isUnresolvedEnvRef(value: string | undefined): boolean {
  if (!value) return false;
  return value.startsWith('env:') || value.startsWith('$');
}

function envFlag(name: string): boolean | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  return TRUTHY_ENV_VALUES.has(raw.trim().toLowerCase());
}

function cloneDefaults(): Config {
  return structuredClone(ConfigDefaults);
}

function formatIssues(error: { issues: Array<{ path: Array<string | number>; message: string }> }): string {
  return error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
}

function mergeConfig(base: Config, raw: RawConfig): Config {
  const result = base;
  if (raw.analysis) {
    result.analysis = { ...result.analysis, ...raw.analysis };
  }
  if (raw.scoring) {
    result.scoring = {
      ...result.scoring,
      ...raw.scoring,
      weights: { ...result.scoring.weights, ...raw.scoring.weights },
    };
  }
  if (raw.sources) {
    result.sources = {
      ...result.sources,
      ...raw.sources,
      arxiv: { ...result.sources.arxiv, ...raw.sources.arxiv },
      nasa: { ...result.sources.nasa, ...raw.sources.nasa },
    };
  }
  if (raw.summarizer) {
    result.summarizer = { ...result.summarizer, ...raw.summarizer };
  }
  if (raw.storage) {
    result.storage = { ...result.storage, ...raw.storage };
  }
  return result;
}

/**
 * Apply environment fallbacks for API keys and demo switches.
 * Unresolved references (e.g. "env:NASA_API_KEY" with the variable unset) are cleared first.
 */
function applyEnvVarFallbacks(config: Config): void {
  if (isUnresolvedEnvRef(config.summarizer.api_key)) {
    config.summarizer.api_key = undefined;
  }
  if (isUnresolvedEnvRef(config.sources.nasa.api_key)) {
    config.sources.nasa.api_key = undefined;
  }

  if (!config.summarizer.api_key) {
    const envKey = process.env['GEMINI_API_KEY'] || process.env['GOOGLE_API_KEY'];
    if (envKey) {
      config.summarizer.api_key = envKey;
    }
  }
  if (!config.sources.nasa.api_key) {
    const envKey = process.env['NASA_API_KEY'];
    if (envKey) {
      config.sources.nasa.api_key = envKey;
    }
  }

  const nasaDemo = envFlag('NASA_DEMO_MODE');
  if (nasaDemo !== undefined) {
    config.sources.nasa.demo_mode = nasaDemo;
  }
  const arxivDemo = envFlag('ARXIV_DEMO_MODE');
  if (arxivDemo !== undefined) {
    config.sources.arxiv.demo_mode = arxivDemo;
  }
}

export interface LoadConfigResult {
  config: Config;
  configFileExists: boolean;
  envKeysUsed: string[];
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  return loadConfigWithMeta(options).config;
}

export function loadConfigWithMeta(options: LoadConfigOptions = {}): LoadConfigResult {
  const configPath = getConfigPath(options.configPath);
  const configFileExists = existsSync(configPath);

  let result = cloneDefaults();

  if (configFileExists) {
    let fileContent: string;
    try {
      fileContent = readFileSync(configPath, 'utf-8');
    } catch {
      throw new ConfigError(`Failed to read config file: ${configPath}`);
    }

    let rawConfig: unknown;
    try {
      rawConfig = parse(fileContent);
    } catch {
      throw new ConfigError(`Failed to parse config file: ${configPath}`);
    }

    if (rawConfig !== null && rawConfig !== undefined) {
      const resolvedConfig = resolveEnvVarsInObject(stripNullValues(rawConfig));
      const validated = ConfigSchema.safeParse(resolvedConfig);

      if (!validated.success) {
        throw new ConfigError(`Invalid config: ${formatIssues(validated.error)}`);
      }

      result = mergeConfig(result, validated.data);
    }
  }

  // Track which env vars provide API keys (before applying fallbacks)
  const envKeysUsed: string[] = [];
  if (!result.summarizer.api_key || isUnresolvedEnvRef(result.summarizer.api_key)) {
    if (process.env['GEMINI_API_KEY']) {
      envKeysUsed.push('GEMINI_API_KEY');
    } else if (process.env['GOOGLE_API_KEY']) {
      envKeysUsed.push('GOOGLE_API_KEY');
    }
  }
  if ((!result.sources.nasa.api_key || isUnresolvedEnvRef(result.sources.nasa.api_key)) && process.env['NASA_API_KEY']) {
    envKeysUsed.push('NASA_API_KEY');
  }

  applyEnvVarFallbacks(result);

  return { config: result, configFileExists, envKeysUsed };
}

export function getConfigPath(configPath?: string): string {
  if (configPath) {
    return expandTilde(configPath);
  }
  return getDefaultConfigPath();
}

function coerceValue(value: string): string | number | boolean | string[] {
  const numValue = Number(value);
  if (!isNaN(numValue) && value.trim() !== '') {
    return numValue;
  }
  if (value === 'true') return true;
  if (value === 'false') return false;
  // Comma-separated lists, e.g. sources.enabled=local,arxiv
  if (value.includes(',')) {
    return value.split(',').map(part => part.trim()).filter(part => part.length > 0);
  }
  return value;
}

export function setConfigValue(key: string, value: string, options: LoadConfigOptions = {}): void {
  const configPath = getConfigPath(options.configPath);

  if (!existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}. Run 'starsift config init' first.`);
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch {
    throw new ConfigError(`Failed to read config file: ${configPath}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(fileContent);
  } catch {
    throw new ConfigError(`Failed to parse config file: ${configPath}`);
  }
  const doc: Record<string, unknown> = isRecord(parsed) ? parsed : {};

  // Navigate dot-notation key
  const keys = key.split('.');
  const lastKey = keys.pop();
  if (!lastKey) {
    throw new ConfigError('Config key must not be empty');
  }
  let current = doc;
  for (const segment of keys) {
    const next = current[segment];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[segment] = created;
      current = created;
    }
  }

  current[lastKey] = coerceValue(value);

  // Validate modified config (strip nulls from YAML comments)
  const validated = ConfigSchema.safeParse(stripNullValues(doc));
  if (!validated.success) {
    throw new ConfigError(`Invalid config after setting ${key}: ${formatIssues(validated.error)}`);
  }

  writeFileSync(configPath, stringify(doc), 'utf-8');
}

import {
  MemoryStore,
  Orchestrator,
  createExtractorConfig,
  createScorerConfig,
  createSummarizer,
  type ExtractorConfig,
  type ScorerConfig,
} from '@starsift/core';
import { createDefaultRegistry, type SourceHooks, type SourcesConfig } from '@starsift/tools';
import { expandTilde, type Config } from './config/index.js';

export interface RunOverrides {
  /** Source names to fetch; the configured `sources.enabled` list when omitted. */
  sources?: string[];
  threshold?: number;
}

export interface RuntimeHooks extends SourceHooks {
  onMemoryError?: (error: Error) => void;
}

export function toExtractorConfig(config: Config): ExtractorConfig {
  return createExtractorConfig({
    keywords: config.analysis.keywords,
    minClaimLength: config.analysis.min_claim_length,
    maxSnippetChars: config.analysis.max_snippet_chars,
  });
}

export function toScorerConfig(config: Config, threshold?: number): ScorerConfig {
  const { weights } = config.scoring;
  return createScorerConfig({
    threshold: threshold ?? config.scoring.threshold,
    weights: {
      keyword: weights.keyword,
      numericBonus: weights.numeric_bonus,
      lengthBonus: weights.length_bonus,
      claimBonus: weights.claim_bonus,
    },
    numericThreshold: config.scoring.numeric_threshold,
    minWordCountForBonus: config.scoring.min_word_count_for_bonus,
  });
}

export function toSourcesConfig(config: Config): SourcesConfig {
  const { sources } = config;
  return {
    samplesDir: expandTilde(sources.samples_dir),
    arxiv: {
      demoMode: sources.arxiv.demo_mode,
      query: sources.arxiv.query,
      maxResults: sources.arxiv.max_results,
    },
    nasa: {
      demoMode: sources.nasa.demo_mode,
      apiKey: sources.nasa.api_key,
      mission: sources.nasa.mission,
    },
  };
}

export function createMemoryStore(config: Config, hooks: RuntimeHooks = {}): MemoryStore {
  return new MemoryStore(expandTilde(config.storage.memory_path), { onError: hooks.onMemoryError });
}

/** Wire config, sources, memory and summarizer into one orchestrator. */
export function buildOrchestrator(config: Config, overrides: RunOverrides = {}, hooks: RuntimeHooks = {}): Orchestrator {
  const registry = createDefaultRegistry(toSourcesConfig(config), hooks);
  const names = overrides.sources && overrides.sources.length > 0 ? overrides.sources : config.sources.enabled;

  return new Orchestrator({
    source: registry.combine(names),
    memory: createMemoryStore(config, hooks),
    summarizer: createSummarizer({
      googleApiKey: config.summarizer.api_key,
      model: config.summarizer.model,
      maxOutputTokens: config.summarizer.max_output_tokens,
    }),
    extractor: toExtractorConfig(config),
    scorer: toScorerConfig(config, overrides.threshold),
    outputDir: expandTilde(config.storage.output_dir),
  });
}

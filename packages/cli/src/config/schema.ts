import { z } from 'zod';
import {
  DEFAULT_KEYWORDS,
  DEFAULT_MAX_SNIPPET_CHARS,
  DEFAULT_MEMORY_PATH,
  DEFAULT_MIN_CLAIM_LENGTH,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_SUMMARY_MODEL,
  DEFAULT_THRESHOLD,
  DEFAULT_WEIGHTS,
} from '@starsift/core';
import {
  DEFAULT_ARXIV_MAX_RESULTS,
  DEFAULT_ARXIV_QUERY,
  DEFAULT_MISSION,
  DEFAULT_SAMPLES_DIR,
  SOURCE_NAMES,
  type SourceName,
} from '@starsift/tools';

const envVarPattern = /^(env:|\\?\$\{?)/;

const envVarSchema = z.string().refine(
  (val) => envVarPattern.test(val),
  { message: 'Must start with env:, $, or ${' }
).brand('envVar');

export type EnvVar = z.infer<typeof envVarSchema>;

const apiKeySchema = z.union([
  envVarSchema,
  z.string().min(1),
]);

const analysisSchema = z.object({
  keywords: z.array(z.string().min(1)).optional(),
  min_claim_length: z.number().int().nonnegative().optional(),
  max_snippet_chars: z.number().int().positive().optional(),
}).strict();

const weightsSchema = z.object({
  keyword: z.number().optional(),
  numeric_bonus: z.number().optional(),
  length_bonus: z.number().optional(),
  claim_bonus: z.number().optional(),
}).strict();

const scoringSchema = z.object({
  threshold: z.number().optional(),
  weights: weightsSchema.optional(),
  numeric_threshold: z.number().int().nonnegative().optional(),
  min_word_count_for_bonus: z.number().int().nonnegative().optional(),
}).strict();

const arxivSchema = z.object({
  demo_mode: z.boolean().optional(),
  query: z.string().min(1).optional(),
  max_results: z.number().int().positive().optional(),
}).strict();

const nasaSchema = z.object({
  demo_mode: z.boolean().optional(),
  api_key: apiKeySchema.optional(),
  mission: z.string().min(1).optional(),
}).strict();

const sourcesSchema = z.object({
  enabled: z.array(z.enum(SOURCE_NAMES)).min(1).optional(),
  samples_dir: z.string().optional(),
  arxiv: arxivSchema.optional(),
  nasa: nasaSchema.optional(),
}).strict();

const summarizerSchema = z.object({
  provider: z.enum(['google']).optional(),
  api_key: apiKeySchema.optional(),
  model: z.string().optional(),
  max_output_tokens: z.number().int().positive().optional(),
}).strict();

const storageSchema = z.object({
  memory_path: z.string().optional(),
  output_dir: z.string().optional(),
}).strict();

const ConfigSchema = z.object({
  analysis: analysisSchema.optional(),
  scoring: scoringSchema.optional(),
  sources: sourcesSchema.optional(),
  summarizer: summarizerSchema.optional(),
  storage: storageSchema.optional(),
}).strict();

export type RawConfig = z.infer<typeof ConfigSchema>;

export interface Config {
  analysis: {
    keywords: string[];
    min_claim_length: number;
    max_snippet_chars: number;
  };
  scoring: {
    threshold: number;
    weights: {
      keyword: number;
      numeric_bonus: number;
      length_bonus: number;
      claim_bonus: number;
    };
    numeric_threshold: number;
    min_word_count_for_bonus: number;
  };
  sources: {
    enabled: SourceName[];
    samples_dir: string;
    arxiv: {
      demo_mode: boolean;
      query: string;
      max_results: number;
    };
    nasa: {
      demo_mode: boolean;
      api_key?: string;
      mission: string;
    };
  };
  summarizer: {
    provider: 'google';
    api_key?: string;
    model: string;
    max_output_tokens?: number;
  };
  storage: {
    memory_path: string;
    output_dir: string;
  };
}

export const ConfigDefaults: Config = {
  analysis: {
    keywords: [...DEFAULT_KEYWORDS],
    min_claim_length: DEFAULT_MIN_CLAIM_LENGTH,
    max_snippet_chars: DEFAULT_MAX_SNIPPET_CHARS,
  },
  scoring: {
    threshold: DEFAULT_THRESHOLD,
    weights: {
      keyword: DEFAULT_WEIGHTS.keyword,
      numeric_bonus: DEFAULT_WEIGHTS.numericBonus,
      length_bonus: DEFAULT_WEIGHTS.lengthBonus,
      claim_bonus: DEFAULT_WEIGHTS.claimBonus,
    },
    numeric_threshold: 2,
    min_word_count_for_bonus: 20,
  },
  sources: {
    enabled: ['local', 'arxiv', 'nasa_apod'],
    samples_dir: DEFAULT_SAMPLES_DIR,
    arxiv: {
      demo_mode: false,
      query: DEFAULT_ARXIV_QUERY,
      max_results: DEFAULT_ARXIV_MAX_RESULTS,
    },
    nasa: {
      demo_mode: false,
      mission: DEFAULT_MISSION,
    },
  },
  summarizer: {
    provider: 'google',
    model: DEFAULT_SUMMARY_MODEL,
  },
  storage: {
    memory_path: DEFAULT_MEMORY_PATH,
    output_dir: DEFAULT_OUTPUT_DIR,
  },
};

export { ConfigSchema };

/**
 * Extractor: turns raw text into an {@link AnalysisRecord}.
 *
 * Every step reads the normalized text and none of them can fail: tokens that
 * do not parse are dropped and degenerate input produces an empty record.
 *
 * Sentence splitting is naive. Abbreviations ("Dr. Smith") and quoted
 * punctuation split sentences; decimals do not, since no whitespace follows
 * their point.
 */

import {
  MEASUREMENT_PATTERN,
  MICRO_SIGN,
  NUMBER_PATTERN,
  SENTENCE_BOUNDARY,
  WHITESPACE_RUN,
  hasMeasurement,
  parseNumberToken,
} from './grammar.js';
import type {
  AnalysisRecord,
  AnalyzedItem,
  ExtractorConfig,
  Measurement,
  SourceItem,
} from './types.js';

export const DEFAULT_KEYWORDS: readonly string[] = Object.freeze([
  'exoplanet',
  'orbital',
  'orbit',
  'radius',
  'mass',
  'transit',
  'spectra',
  'spectrum',
  'atmosphere',
  'cme',
  'solar',
  'habitability',
  'habitable',
  'apparent magnitude',
  'period',
  'days',
  'light-years',
  'spectroscopy',
]);

export const DEFAULT_MIN_CLAIM_LENGTH = 30;
export const DEFAULT_MAX_SNIPPET_CHARS = 400;
export const TRUNCATION_MARKER = '...';

export interface ExtractorOptions {
  keywords?: Iterable<string>;
  minClaimLength?: number;
  maxSnippetChars?: number;
}

/**
 * Build an immutable extractor configuration. An empty or missing keyword
 * list falls back to {@link DEFAULT_KEYWORDS}.
 */
export function createExtractorConfig(options: ExtractorOptions = {}): ExtractorConfig {
  const custom = options.keywords ? [...options.keywords].map(k => k.toLowerCase()) : [];
  return Object.freeze({
    keywords: Object.freeze(custom.length > 0 ? custom : [...DEFAULT_KEYWORDS]),
    minClaimLength: options.minClaimLength ?? DEFAULT_MIN_CLAIM_LENGTH,
    maxSnippetChars: options.maxSnippetChars ?? DEFAULT_MAX_SNIPPET_CHARS,
  });
}

export const DEFAULT_EXTRACTOR_CONFIG: ExtractorConfig = createExtractorConfig();

// ---------------------------------------------------------------------------
// Steps
// ---------------------------------------------------------------------------

export function normalizeText(text: string): string {
  if (!text) return '';
  return text.replace(WHITESPACE_RUN, ' ').trim();
}

export function countWords(normalized: string): number {
  if (!normalized) return 0;
  return normalized.split(' ').filter(token => token.length > 0).length;
}

export function splitSentences(normalized: string): string[] {
  if (!normalized) return [];
  return normalized
    .split(SENTENCE_BOUNDARY)
    .map(s => s.trim())
    .filter(s => s.length > 0);
}

export function extractNumbers(normalized: string): number[] {
  return [...normalized.matchAll(NUMBER_PATTERN)]
    .map(match => parseNumberToken(match[0]))
    .filter((value): value is number => value !== undefined);
}

export function extractMeasurements(normalized: string): Measurement[] {
  const results: Measurement[] = [];
  for (const match of normalized.matchAll(MEASUREMENT_PATTERN)) {
    const value = parseNumberToken(match.groups?.value ?? '');
    const unit = match.groups?.unit;
    if (value === undefined || !unit) continue;
    results.push({
      value,
      unit: unit.trim().replace(MICRO_SIGN, 'u'),
      raw: match[0],
    });
  }
  return results;
}

export function detectKeywords(normalized: string, vocabulary: readonly string[]): string[] {
  const lower = normalized.toLowerCase();
  const found: string[] = [];
  for (const keyword of vocabulary) {
    if (lower.includes(keyword) && !found.includes(keyword)) {
      found.push(keyword);
    }
  }
  return found;
}

/**
 * Keep sentences long enough to matter that carry a measurement or one of
 * the configured keywords.
 */
export function detectClaims(sentences: readonly string[], config: ExtractorConfig): string[] {
  return sentences.filter(sentence => {
    if (charLength(sentence) < config.minClaimLength) return false;
    if (hasMeasurement(sentence)) return true;
    const lower = sentence.toLowerCase();
    return config.keywords.some(keyword => lower.includes(keyword));
  });
}

/** Length in code points, so astral characters count once. */
export function charLength(text: string): number {
  return Array.from(text).length;
}

/** First `maxChars` code points of `text`; never splits a surrogate pair. */
export function sliceChars(text: string, maxChars: number): string {
  return Array.from(text).slice(0, maxChars).join('');
}

export function buildSnippet(normalized: string, maxChars: number): string {
  const chars = Array.from(normalized);
  if (chars.length <= maxChars) return normalized;
  return chars.slice(0, maxChars).join('') + TRUNCATION_MARKER;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function analyze(rawText: string, config: ExtractorConfig = DEFAULT_EXTRACTOR_CONFIG): AnalysisRecord {
  const normalized = normalizeText(rawText);
  const sentences = splitSentences(normalized);

  return Object.freeze({
    wordCount: countWords(normalized),
    sentenceCount: sentences.length,
    numbers: Object.freeze(extractNumbers(normalized)),
    measurements: Object.freeze(extractMeasurements(normalized).map(m => Object.freeze(m))),
    keywords: Object.freeze(detectKeywords(normalized, config.keywords)),
    claims: Object.freeze(detectClaims(sentences, config)),
    snippet: buildSnippet(normalized, config.maxSnippetChars),
  });
}

export function analyzeItem(item: SourceItem, config: ExtractorConfig = DEFAULT_EXTRACTOR_CONFIG): AnalyzedItem {
  return {
    originalId: item.id,
    title: item.title,
    source: item.source,
    analysis: analyze(item.raw ?? '', config),
  };
}

export function analyzeItems(items: Iterable<SourceItem>, config: ExtractorConfig = DEFAULT_EXTRACTOR_CONFIG): AnalyzedItem[] {
  return [...items].map(item => analyzeItem(item, config));
}

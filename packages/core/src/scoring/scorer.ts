/**
 * Scorer: additive, transparent heuristics over an {@link AnalysisRecord}.
 *
 * Six factors are evaluated in a fixed order (keyword, numeric, measurement,
 * length, claim, penalty) and the reasons are emitted in that same order so
 * results stay diffable across runs.
 */

import type { AnalysisRecord, AnalyzedItem } from '../analysis/types.js';
import type {
  ScoreBreakdown,
  ScoreMetrics,
  ScoreResult,
  ScoredItem,
  ScorerConfig,
  ScoringWeights,
} from './types.js';

export const DEFAULT_WEIGHTS: Readonly<ScoringWeights> = Object.freeze({
  keyword: 2.0,
  numericBonus: 3.0,
  lengthBonus: 1.0,
  claimBonus: 1.5,
});

export const DEFAULT_THRESHOLD = 3.0;

const MEASUREMENT_POINTS = 0.5;
const MEASUREMENT_CAP = 3.0;
const CLAIM_CAP = 6.0;
const SHORT_CONTENT_WORDS = 6;
const SHORT_CONTENT_PENALTY = -2.0;

export interface ScorerOptions {
  threshold?: number;
  weights?: Partial<ScoringWeights>;
  numericThreshold?: number;
  minWordCountForBonus?: number;
}

export function createScorerConfig(options: ScorerOptions = {}): ScorerConfig {
  return Object.freeze({
    threshold: options.threshold ?? DEFAULT_THRESHOLD,
    weights: Object.freeze({ ...DEFAULT_WEIGHTS, ...options.weights }),
    numericThreshold: options.numericThreshold ?? 2,
    minWordCountForBonus: options.minWordCountForBonus ?? 20,
  });
}

export const DEFAULT_SCORER_CONFIG: ScorerConfig = createScorerConfig();

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

function points(value: number): string {
  return value.toFixed(1);
}

export function score(record: AnalysisRecord, config: ScorerConfig = DEFAULT_SCORER_CONFIG): ScoreResult {
  const { weights } = config;
  const reasons: string[] = [];

  const keywordCount = record.keywords.length;
  const keyword = keywordCount * weights.keyword;
  if (keywordCount > 0) {
    reasons.push(`Keywords detected: ${keywordCount} (+${points(keyword)})`);
  }

  const numberCount = record.numbers.length;
  let numeric = 0;
  if (numberCount > config.numericThreshold) {
    numeric = weights.numericBonus;
    reasons.push(`Numeric density high (${numberCount} numbers) (+${points(numeric)})`);
  }

  const measurementCount = record.measurements.length;
  const measurement = Math.min(measurementCount * MEASUREMENT_POINTS, MEASUREMENT_CAP);
  if (measurementCount > 0) {
    reasons.push(`Measurements found: ${measurementCount} (+${points(measurement)})`);
  }

  // The only factor that always reports.
  let length = 0;
  if (record.wordCount >= config.minWordCountForBonus) {
    length = weights.lengthBonus;
    reasons.push(`Content length sufficient (${record.wordCount} words) (+${points(length)})`);
  } else {
    reasons.push(`Short content (${record.wordCount} words) (no length bonus)`);
  }

  const claimCount = record.claims.length;
  const claim = Math.min(claimCount * weights.claimBonus, CLAIM_CAP);
  if (claim > 0) {
    reasons.push(`Claims detected: ${claimCount} (+${points(claim)})`);
  }

  let penalty = 0;
  if (record.wordCount < SHORT_CONTENT_WORDS) {
    penalty = SHORT_CONTENT_PENALTY;
    reasons.push(`Very short content; penalized (${points(penalty)})`);
  }

  const breakdown: ScoreBreakdown = { keyword, numeric, measurement, length, claim, penalty };
  const total = round3(keyword + numeric + measurement + length + claim + penalty);

  return {
    score: total,
    passed: total >= config.threshold,
    reasons,
    breakdown,
  };
}

// ---------------------------------------------------------------------------
// Batch helpers
// ---------------------------------------------------------------------------

export function scoreItem(item: AnalyzedItem, config: ScorerConfig = DEFAULT_SCORER_CONFIG): ScoredItem {
  return { originalId: item.originalId, ...score(item.analysis, config) };
}

export function scoreItems(items: Iterable<AnalyzedItem>, config: ScorerConfig = DEFAULT_SCORER_CONFIG): ScoredItem[] {
  return [...items].map(item => scoreItem(item, config));
}

export function filterPassed<T extends Pick<ScoreResult, 'passed'>>(scored: Iterable<T>): T[] {
  return [...scored].filter(item => item.passed);
}

/** Mean score and pass rate of a scored batch, rounded to 3 decimals. */
export function summarizeScores(scored: Iterable<Pick<ScoreResult, 'score' | 'passed'>>): ScoreMetrics {
  const items = [...scored];
  if (items.length === 0) {
    return { count: 0, meanScore: 0, passRate: 0 };
  }
  const total = items.reduce((sum, item) => sum + item.score, 0);
  const passed = items.filter(item => item.passed).length;
  return {
    count: items.length,
    meanScore: round3(total / items.length),
    passRate: round3(passed / items.length),
  };
}

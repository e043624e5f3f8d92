export interface ScoringWeights {
  /** Points per detected keyword. */
  keyword: number;
  /** Flat bonus when the text carries more than `numericThreshold` numbers. */
  numericBonus: number;
  /** Flat bonus for sufficiently long content. */
  lengthBonus: number;
  /** Points per claim, capped. */
  claimBonus: number;
}

export interface ScorerConfig {
  readonly threshold: number;
  readonly weights: Readonly<ScoringWeights>;
  readonly numericThreshold: number;
  readonly minWordCountForBonus: number;
}

export type ScoreFactor = 'keyword' | 'numeric' | 'measurement' | 'length' | 'claim' | 'penalty';

export type ScoreBreakdown = Record<ScoreFactor, number>;

export interface ScoreResult {
  score: number;
  passed: boolean;
  /** One line per contributing factor, in evaluation order. */
  reasons: string[];
  breakdown: ScoreBreakdown;
}

export interface ScoredItem extends ScoreResult {
  originalId: string;
}

export interface ScoreMetrics {
  count: number;
  meanScore: number;
  passRate: number;
}

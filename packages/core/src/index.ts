export {
  type Measurement,
  type AnalysisRecord,
  type ExtractorConfig,
  type SourceItem,
  type AnalyzedItem,
} from './analysis/types.js';

export {
  type ExtractorOptions,
  DEFAULT_KEYWORDS,
  DEFAULT_MIN_CLAIM_LENGTH,
  DEFAULT_MAX_SNIPPET_CHARS,
  DEFAULT_EXTRACTOR_CONFIG,
  TRUNCATION_MARKER,
  createExtractorConfig,
  normalizeText,
  countWords,
  splitSentences,
  extractNumbers,
  extractMeasurements,
  detectKeywords,
  detectClaims,
  charLength,
  sliceChars,
  buildSnippet,
  analyze,
  analyzeItem,
  analyzeItems,
} from './analysis/extractor.js';

export {
  NUMBER_PATTERN,
  MEASUREMENT_PATTERN,
  SENTENCE_BOUNDARY,
  WHITESPACE_RUN,
  parseNumberToken,
  hasMeasurement,
} from './analysis/grammar.js';

export {
  type ScoringWeights,
  type ScorerConfig,
  type ScoreFactor,
  type ScoreBreakdown,
  type ScoreResult,
  type ScoredItem,
  type ScoreMetrics,
} from './scoring/types.js';

export {
  type ScorerOptions,
  DEFAULT_WEIGHTS,
  DEFAULT_THRESHOLD,
  DEFAULT_SCORER_CONFIG,
  createScorerConfig,
  score,
  scoreItem,
  scoreItems,
  filterPassed,
  summarizeScores,
} from './scoring/scorer.js';

export {
  type SummaryMethod,
  type SummaryResult,
  type SummarizerOptions,
  type CreateSummarizerOptions,
  DEFAULT_SUMMARY_MODEL,
  Summarizer,
  summarizeLocal,
  createSummarizer,
  isAbortError,
} from './summary/summarizer.js';

export {
  type MemoryData,
  type MemoryRecord,
  type MemoryStoreOptions,
  DEFAULT_MEMORY_PATH,
  MemoryRecordSchema,
  MemoryStore,
} from './memory/store.js';

export {
  type RunItemLog,
  type RunLog,
  type SessionSnapshot,
  type SessionState,
  SESSION_STATE_FILE,
  runLogFilename,
  writeJsonFile,
  writeRunLog,
  readSessionState,
  updateSessionState,
} from './output/run-log.js';

export {
  type FetchContext,
  type ItemSource,
  type RunStartEvent,
  type FetchCompleteEvent,
  type ItemSkippedEvent,
  type ItemStoredEvent,
  type ItemErrorEvent,
  type SummaryFallbackEvent,
  type RunCompleteEvent,
  type SessionUpdateEvent,
  type OrchestratorEvents,
} from './pipeline/types.js';

export {
  type OrchestratorOptions,
  type ContinuousRunOptions,
  type RunResult,
  DEFAULT_OUTPUT_DIR,
  Orchestrator,
} from './pipeline/orchestrator.js';

/**
 * Analysis types shared by the extractor, the scorer and the summarizer.
 */

/** A number paired with the unit-like token that follows it. Not unit-validated. */
export interface Measurement {
  value: number;
  unit: string;
  /** The full matched span, e.g. `33 days`. */
  raw: string;
}

/** Structured statistics extracted from one text. */
export interface AnalysisRecord {
  wordCount: number;
  sentenceCount: number;
  /** Every numeric literal, in order of appearance, duplicates kept. */
  numbers: readonly number[];
  measurements: readonly Measurement[];
  /** Vocabulary entries found in the text, in vocabulary order. */
  keywords: readonly string[];
  /** Candidate fact sentences, in order of appearance. */
  claims: readonly string[];
  snippet: string;
}

export interface ExtractorConfig {
  /** Lower-cased keyword vocabulary. */
  readonly keywords: readonly string[];
  /** Minimum sentence length (characters) for a claim. */
  readonly minClaimLength: number;
  readonly maxSnippetChars: number;
}

/** A raw item as supplied by an item source. */
export interface SourceItem {
  id: string;
  title?: string;
  /** Provenance marker: `local_file`, `arxiv`, `nasa_apod_mock`, ... */
  source?: string;
  raw?: string;
}

export interface AnalyzedItem {
  originalId: string;
  title?: string;
  source?: string;
  analysis: AnalysisRecord;
}

import { generateText, type LanguageModel } from 'ai';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import type { AnalysisRecord, SourceItem } from '../analysis/types.js';
import { sliceChars } from '../analysis/extractor.js';

export type SummaryMethod = 'llm' | 'local';

export interface SummaryResult {
  text: string;
  method: SummaryMethod;
  /** Why the model was not used, when a model is configured but the local summary was returned. */
  fallbackReason?: string;
}

export interface SummarizerOptions {
  /** Resolved AI SDK model. Without one every summary is local. */
  model?: LanguageModel;
  maxOutputTokens?: number;
}

export const DEFAULT_SUMMARY_MODEL = 'gemini-2.5-flash';

const LOCAL_EXCERPT_CLAIMS = 2;
const LOCAL_EXCERPT_CHARS = 200;
const NO_KEY_TERMS = 'no key terms detected';

const SUMMARY_PROMPT =
  'Summarize the following space research text in 3-4 sentences, ' +
  'focusing on the central scientific findings:\n\n';

/**
 * Deterministic summary built from the analysis alone: the first two claims
 * (or the head of the snippet) followed by the detected key terms.
 */
export function summarizeLocal(analysis: Pick<AnalysisRecord, 'claims' | 'keywords' | 'snippet'>): string {
  const excerpt = analysis.claims.length > 0
    ? analysis.claims.slice(0, LOCAL_EXCERPT_CLAIMS).join(' ')
    : sliceChars(analysis.snippet, LOCAL_EXCERPT_CHARS);
  const terms = analysis.keywords.length > 0 ? analysis.keywords.join(', ') : NO_KEY_TERMS;
  return `${excerpt.trim()}\n\n(Key terms: ${terms})`;
}

export function isAbortError(err: unknown, abortSignal?: AbortSignal): boolean {
  if (err instanceof Error && err.name === 'AbortError') return true;
  return abortSignal?.aborted === true;
}

export class Summarizer {
  private readonly options: SummarizerOptions;

  constructor(options: SummarizerOptions = {}) {
    this.options = options;
  }

  get usesModel(): boolean {
    return this.options.model !== undefined;
  }

  /**
   * Summarize one item. Model failures fall back to the local summary;
   * cancellation through `abortSignal` is rethrown.
   */
  async summarize(item: SourceItem, analysis: AnalysisRecord, abortSignal?: AbortSignal): Promise<SummaryResult> {
    const { model } = this.options;
    if (!model) {
      return { text: summarizeLocal(analysis), method: 'local' };
    }

    const raw = item.raw ?? '';
    if (!raw.trim()) {
      return { text: summarizeLocal(analysis), method: 'local', fallbackReason: 'No text to summarize' };
    }

    try {
      const result = await generateText({
        model,
        prompt: SUMMARY_PROMPT + raw,
        maxOutputTokens: this.options.maxOutputTokens,
        abortSignal,
      });
      const text = result.text.trim();
      if (text) {
        return { text, method: 'llm' };
      }
      return { text: summarizeLocal(analysis), method: 'local', fallbackReason: 'Model returned an empty summary' };
    } catch (err) {
      if (isAbortError(err, abortSignal)) throw err;
      const message = err instanceof Error ? err.message : String(err);
      return { text: summarizeLocal(analysis), method: 'local', fallbackReason: `Model call failed: ${message}` };
    }
  }
}

export interface CreateSummarizerOptions {
  googleApiKey?: string;
  /** Gemini model id. */
  model?: string;
  maxOutputTokens?: number;
}

/** Gemini-backed summarizer when a key is present, local-only otherwise. */
export function createSummarizer(options: CreateSummarizerOptions = {}): Summarizer {
  if (!options.googleApiKey) {
    return new Summarizer({ maxOutputTokens: options.maxOutputTokens });
  }
  const google = createGoogleGenerativeAI({ apiKey: options.googleApiKey });
  return new Summarizer({
    model: google(options.model ?? DEFAULT_SUMMARY_MODEL),
    maxOutputTokens: options.maxOutputTokens,
  });
}

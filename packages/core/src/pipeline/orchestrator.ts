import { EventEmitter } from 'eventemitter3';
import { join } from 'node:path';
import { analyzeItem, DEFAULT_EXTRACTOR_CONFIG } from '../analysis/extractor.js';
import type { ExtractorConfig, SourceItem } from '../analysis/types.js';
import { scoreItem, summarizeScores, DEFAULT_SCORER_CONFIG } from '../scoring/scorer.js';
import type { ScoredItem, ScorerConfig } from '../scoring/types.js';
import type { MemoryStore } from '../memory/store.js';
import { Summarizer, isAbortError } from '../summary/summarizer.js';
import {
  SESSION_STATE_FILE,
  updateSessionState,
  writeRunLog,
  type RunItemLog,
  type RunLog,
  type SessionSnapshot,
  type SessionState,
} from '../output/run-log.js';
import type { ItemSource, OrchestratorEvents } from './types.js';

export const DEFAULT_OUTPUT_DIR = 'data/demo_outputs';

export interface OrchestratorOptions {
  source: ItemSource;
  memory: MemoryStore;
  summarizer?: Summarizer;
  extractor?: ExtractorConfig;
  scorer?: ScorerConfig;
  /** Where run logs and session state are written. */
  outputDir?: string;
  now?: () => Date;
}

export interface ContinuousRunOptions {
  iterations: number;
  /** Pause between iterations; none after the last. */
  intervalMs: number;
  /** Stops the loop between iterations. */
  signal?: AbortSignal;
}

export interface RunResult {
  log: RunLog;
  /** Path of the written run log. */
  path: string;
}

/**
 * Runs fetch, analyze, score, summarize and store over every item of a
 * source. Failures on single items are recorded in the run log and the run
 * carries on; a failing source propagates.
 */
export class Orchestrator extends EventEmitter<OrchestratorEvents> {
  private readonly source: ItemSource;
  private readonly memory: MemoryStore;
  private readonly summarizer: Summarizer;
  private readonly extractor: ExtractorConfig;
  private readonly scorer: ScorerConfig;
  private readonly now: () => Date;
  readonly outputDir: string;

  constructor(options: OrchestratorOptions) {
    super();
    this.source = options.source;
    this.memory = options.memory;
    this.summarizer = options.summarizer ?? new Summarizer();
    this.extractor = options.extractor ?? DEFAULT_EXTRACTOR_CONFIG;
    this.scorer = options.scorer ?? DEFAULT_SCORER_CONFIG;
    this.outputDir = options.outputDir ?? DEFAULT_OUTPUT_DIR;
    this.now = options.now ?? (() => new Date());
  }

  /** False when every summary will be built locally. */
  get usesModel(): boolean {
    return this.summarizer.usesModel;
  }

  async runOnce(signal?: AbortSignal): Promise<RunResult> {
    return this.execute(signal);
  }

  async runContinuous(options: ContinuousRunOptions): Promise<SessionSnapshot> {
    const { iterations, intervalMs, signal } = options;
    const session: SessionSnapshot = { iterationsRequested: iterations, runs: 0, totalProcessed: 0 };

    for (let i = 0; i < iterations; i++) {
      if (signal?.aborted) break;

      const { log } = await this.execute(signal, { iteration: i + 1, iterations });
      session.runs += 1;
      session.totalProcessed += log.processedItems;
      this.writeSession({
        iterationsRequested: session.iterationsRequested,
        runs: session.runs,
        totalProcessed: session.totalProcessed,
      });

      if (i < iterations - 1) {
        const completed = await sleep(intervalMs, signal);
        if (!completed) break;
      }
    }

    return session;
  }

  private async execute(
    signal?: AbortSignal,
    progress: { iteration?: number; iterations?: number } = {},
  ): Promise<RunResult> {
    const startedAt = this.now();
    const timestamp = startedAt.toISOString();
    this.emit('run:start', { timestamp, ...progress });

    const items = await this.source.fetch({ abortSignal: signal });
    this.emit('fetch:complete', { count: items.length });

    const log: RunLog = {
      timestamp,
      steps: [`Fetched ${items.length} items`],
      processedItems: 0,
      items: [],
      metrics: { count: 0, meanScore: 0, passRate: 0 },
    };

    const scored: ScoredItem[] = [];
    for (const item of items) {
      signal?.throwIfAborted();
      const id = item.id || '<no-id>';
      try {
        const entry = await this.processItem(item, id, scored, signal);
        log.items.push(entry);
        if (entry.summary !== undefined) log.processedItems += 1;
      } catch (err) {
        if (isAbortError(err, signal)) throw err;
        const error = err instanceof Error ? err : new Error(String(err));
        this.emit('item:error', { id, error });
        log.items.push({ id, error: error.message });
      }
    }

    const compacted = this.memory.compact();
    log.steps.push(`Processed ${log.processedItems} items`);
    log.steps.push(`Compacted ${compacted} memory records`);
    log.metrics = summarizeScores(scored);

    const path = writeRunLog(this.outputDir, log, startedAt);
    this.writeSession({
      last_run: path,
      last_timestamp: timestamp,
      last_processed: log.processedItems,
      modified: this.now().toISOString(),
    });

    this.emit('run:complete', { log, path, durationMs: this.now().getTime() - startedAt.getTime() });
    return { log, path };
  }

  private async processItem(
    item: SourceItem,
    id: string,
    scored: ScoredItem[],
    signal?: AbortSignal,
  ): Promise<RunItemLog> {
    const analyzed = analyzeItem({ ...item, id }, this.extractor);
    const evaluation = scoreItem(analyzed, this.scorer);
    scored.push(evaluation);

    const entry: RunItemLog = {
      id,
      title: item.title,
      score: evaluation.score,
      passed: evaluation.passed,
    };

    if (!evaluation.passed) {
      this.emit('item:skipped', { id, title: item.title, score: evaluation.score, reasons: evaluation.reasons });
      return entry;
    }

    const summary = await this.summarizer.summarize(item, analyzed.analysis, signal);
    if (summary.fallbackReason) {
      this.emit('summary:fallback', { id, reason: summary.fallbackReason });
    }

    const { updated } = this.memory.store(id, {
      raw: item.raw,
      title: item.title,
      source: item.source,
      analysis: analyzed.analysis,
      evaluation,
      summary: summary.text,
    });

    this.emit('item:stored', {
      id,
      title: item.title,
      score: evaluation.score,
      updated,
      summaryMethod: summary.method,
    });
    return { ...entry, summary: summary.text, summaryMethod: summary.method };
  }

  private writeSession(patch: SessionState): void {
    const state = updateSessionState(this.outputDir, patch);
    this.emit('session:update', { path: join(this.outputDir, SESSION_STATE_FILE), state });
  }
}

/** Resolves false when aborted before the delay elapsed. */
function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

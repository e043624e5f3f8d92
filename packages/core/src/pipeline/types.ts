import type { SourceItem } from '../analysis/types.js';
import type { RunLog, SessionState } from '../output/run-log.js';
import type { SummaryMethod } from '../summary/summarizer.js';

export interface FetchContext {
  /** Abort signal for cancellation support */
  abortSignal?: AbortSignal;
}

/**
 * Anything that yields raw items. Implementations live in @starsift/tools;
 * the orchestrator only depends on this shape.
 */
export interface ItemSource {
  readonly name: string;
  fetch(context?: FetchContext): Promise<SourceItem[]>;
}

// ---------------------------------------------------------------------------
// Orchestrator events
// ---------------------------------------------------------------------------

export interface RunStartEvent {
  timestamp: string;
  iteration?: number;
  iterations?: number;
}

export interface FetchCompleteEvent {
  count: number;
}

export interface ItemSkippedEvent {
  id: string;
  title?: string;
  score: number;
  reasons: string[];
}

export interface ItemStoredEvent {
  id: string;
  title?: string;
  score: number;
  updated: boolean;
  summaryMethod: SummaryMethod;
}

export interface ItemErrorEvent {
  id: string;
  error: Error;
}

export interface SummaryFallbackEvent {
  id: string;
  reason: string;
}

export interface RunCompleteEvent {
  log: RunLog;
  path: string;
  durationMs: number;
}

export interface SessionUpdateEvent {
  path: string;
  state: SessionState;
}

export interface OrchestratorEvents {
  'run:start': (event: RunStartEvent) => void;
  'fetch:complete': (event: FetchCompleteEvent) => void;
  'item:skipped': (event: ItemSkippedEvent) => void;
  'item:stored': (event: ItemStoredEvent) => void;
  'item:error': (event: ItemErrorEvent) => void;
  'summary:fallback': (event: SummaryFallbackEvent) => void;
  'run:complete': (event: RunCompleteEvent) => void;
  'session:update': (event: SessionUpdateEvent) => void;
}

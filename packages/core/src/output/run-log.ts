import { writeFileSync, readFileSync, mkdirSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import type { ScoreMetrics } from '../scoring/types.js';
import type { SummaryMethod } from '../summary/summarizer.js';

export const SESSION_STATE_FILE = 'session_state.json';

export interface RunItemLog {
  id: string;
  title?: string;
  score?: number;
  passed?: boolean;
  summary?: string;
  summaryMethod?: SummaryMethod;
  error?: string;
}

export interface RunLog {
  /** ISO-8601 start time of the run. */
  timestamp: string;
  steps: string[];
  processedItems: number;
  items: RunItemLog[];
  metrics: ScoreMetrics;
}

export interface SessionSnapshot {
  iterationsRequested: number;
  runs: number;
  totalProcessed: number;
}

const SessionStateSchema = z.record(z.unknown());

export type SessionState = z.infer<typeof SessionStateSchema>;

export function runLogFilename(startedAt: Date): string {
  return `run_${Math.floor(startedAt.getTime() / 1000)}.json`;
}

export function writeJsonFile(path: string, value: unknown): void {
  writeFileSync(path, JSON.stringify(value, null, 2), 'utf-8');
}

export function writeRunLog(outputDir: string, log: RunLog, startedAt: Date): string {
  ensureDir(outputDir);
  const path = join(outputDir, runLogFilename(startedAt));
  writeJsonFile(path, log);
  return path;
}

/** Current session state, or an empty object when missing or unreadable. */
export function readSessionState(outputDir: string): SessionState {
  const path = join(outputDir, SESSION_STATE_FILE);
  if (!existsSync(path)) return {};
  try {
    const parsed = SessionStateSchema.safeParse(JSON.parse(readFileSync(path, 'utf-8')));
    return parsed.success ? parsed.data : {};
  } catch {
    // A corrupt state file is replaced on the next write.
    return {};
  }
}

/** Merge `patch` into the session state file and return the result. */
export function updateSessionState(outputDir: string, patch: SessionState): SessionState {
  ensureDir(outputDir);
  const state = { ...readSessionState(outputDir), ...patch };
  writeJsonFile(join(outputDir, SESSION_STATE_FILE), state);
  return state;
}

function ensureDir(dir: string): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

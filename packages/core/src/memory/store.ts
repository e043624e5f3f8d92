import { readFileSync, writeFileSync, mkdirSync, existsSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';

export const DEFAULT_MEMORY_PATH = 'data/memory.json';

export const MemoryDataSchema = z.object({
  summary: z.string().optional(),
  title: z.string().optional(),
  source: z.string().optional(),
  raw: z.string().nullish(),
  analysis: z.unknown().optional(),
  evaluation: z.unknown().optional(),
}).passthrough();

export const MemoryRecordSchema = z.object({
  key: z.string(),
  timestamp: z.number(),
  data: MemoryDataSchema,
});

export const MemoryFileSchema = z.array(MemoryRecordSchema);

export type MemoryData = z.infer<typeof MemoryDataSchema>;
export type MemoryRecord = z.infer<typeof MemoryRecordSchema>;

export interface MemoryStoreOptions {
  /** Seconds since the epoch. */
  now?: () => number;
  /** Called for unreadable, invalid or unwritable memory files. */
  onError?: (error: Error) => void;
}

/**
 * JSON-array memory of processed items, keyed by item id. Every operation
 * re-reads the file so several processes can share one store sequentially.
 */
export class MemoryStore {
  readonly storagePath: string;
  private readonly now: () => number;
  private readonly onError?: (error: Error) => void;

  constructor(storagePath: string = DEFAULT_MEMORY_PATH, options: MemoryStoreOptions = {}) {
    this.storagePath = storagePath;
    this.now = options.now ?? (() => Date.now() / 1000);
    this.onError = options.onError;
  }

  /** Create the parent directory and an empty store when missing. */
  init(): void {
    const dir = dirname(this.storagePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    if (!existsSync(this.storagePath)) {
      writeFileSync(this.storagePath, '[]', 'utf-8');
    }
  }

  load(): MemoryRecord[] {
    if (!existsSync(this.storagePath)) {
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this.storagePath, 'utf-8'));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.onError?.(new Error(`Failed to read memory file ${this.storagePath}: ${message}`));
      return [];
    }

    const result = MemoryFileSchema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues
        .map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; ');
      this.onError?.(new Error(`Invalid memory file ${this.storagePath}: ${issues}`));
      return [];
    }
    return result.data;
  }

  /** Insert or replace the record for `key`. */
  store(key: string, data: MemoryData): { updated: boolean } {
    const memory = this.load();
    const record: MemoryRecord = { key, timestamp: this.now(), data };

    const index = memory.findIndex(r => r.key === key);
    if (index >= 0) {
      memory[index] = record;
    } else {
      memory.push(record);
    }

    this.save(memory);
    return { updated: index >= 0 };
  }

  get(key: string): MemoryRecord | undefined {
    return this.load().find(r => r.key === key);
  }

  list(): MemoryRecord[] {
    return this.load();
  }

  /** Records whose summary contains `text`, case-insensitively. */
  querySimilar(text: string): MemoryRecord[] {
    const needle = text.toLowerCase();
    return this.load().filter(r => typeof r.data.summary === 'string' && r.data.summary.toLowerCase().includes(needle));
  }

  /** Drop stored raw text. Returns the number of records changed. */
  compact(): number {
    const memory = this.load();
    let changed = 0;
    const compacted = memory.map(record => {
      if (!('raw' in record.data)) return record;
      changed++;
      const { raw: _raw, ...rest } = record.data;
      return { ...record, data: rest };
    });

    if (changed > 0) {
      this.save(compacted);
    }
    return changed;
  }

  private save(memory: MemoryRecord[]): void {
    try {
      this.init();
      writeFileSync(this.storagePath, JSON.stringify(memory, null, 2), 'utf-8');
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.onError?.(new Error(`Failed to write memory file ${this.storagePath}: ${message}`));
    }
  }
}

import { createLocalSource } from './local/source.js';
import { createArxivSource } from './arxiv/client.js';
import { createApodSource, createMissionSource } from './nasa/client.js';
import {
  SourceError,
  type FetchContext,
  type ItemSource,
  type SourceHooks,
  type SourceItem,
  type SourcesConfig,
} from './types.js';

const TITLE_KEY_CHARS = 60;

/**
 * Drop repeated items, keeping the first occurrence. Items are keyed by id,
 * or by the start of the title when the id is empty; items with neither are
 * always kept.
 */
export function dedupeItems(items: Iterable<SourceItem>): SourceItem[] {
  const seen = new Set<string>();
  const unique: SourceItem[] = [];
  for (const item of items) {
    const key = item.id || (item.title ?? '').slice(0, TITLE_KEY_CHARS);
    if (key) {
      if (seen.has(key)) continue;
      seen.add(key);
    }
    unique.push(item);
  }
  return unique;
}

export class SourceRegistry {
  private readonly sources = new Map<string, ItemSource>();
  private readonly hooks: SourceHooks;

  constructor(hooks: SourceHooks = {}) {
    this.hooks = hooks;
  }

  register(source: ItemSource): void {
    this.sources.set(source.name, source);
  }

  get(name: string): ItemSource | undefined {
    return this.sources.get(name);
  }

  has(name: string): boolean {
    return this.sources.has(name);
  }

  names(): string[] {
    return [...this.sources.keys()];
  }

  get size(): number {
    return this.sources.size;
  }

  /**
   * Fetch from the named sources in order and de-duplicate the result.
   * Unknown names and failing sources are reported through the hooks and
   * contribute nothing; aborts propagate.
   */
  async fetchAll(names: readonly string[], context: FetchContext = {}): Promise<SourceItem[]> {
    const collected: SourceItem[] = [];

    for (const name of names) {
      const source = this.sources.get(name);
      if (!source) {
        this.hooks.onUnknownSource?.(name);
        continue;
      }

      try {
        collected.push(...await source.fetch(context));
      } catch (err) {
        if (err instanceof Error && err.name === 'AbortError') throw err;
        const error = err instanceof SourceError
          ? err
          : new SourceError(name, err instanceof Error ? err.message : String(err), { cause: err });
        this.hooks.onSourceError?.(error);
      }
    }

    return dedupeItems(collected);
  }

  /** A single source over the named ones, for the orchestrator. */
  combine(names: readonly string[]): ItemSource {
    return {
      name: names.join('+'),
      fetch: context => this.fetchAll(names, context),
    };
  }
}

/** Registry with the built-in sources: local, arxiv, nasa_apod, nasa_mission. */
export function createDefaultRegistry(config: SourcesConfig, hooks: SourceHooks = {}): SourceRegistry {
  const registry = new SourceRegistry(hooks);
  registry.register(createLocalSource(config.samplesDir, hooks));
  registry.register(createArxivSource(config.arxiv, hooks));
  registry.register(createApodSource(config.nasa, hooks));
  registry.register(createMissionSource(config.nasa));
  return registry;
}

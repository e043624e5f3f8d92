import { readdir, readFile } from 'node:fs/promises';
import { extname, join } from 'node:path';
import type { ItemSource, SourceHooks, SourceItem } from '../types.js';

export const DEFAULT_SAMPLES_DIR = 'data/samples';
export const LOCAL_SOURCE = 'local_file';

const SAMPLE_EXTENSIONS = new Set(['.txt', '.md']);

/**
 * Read every `.txt` / `.md` file directly inside `samplesDir`, sorted by name.
 * A missing directory yields no items; unreadable files are skipped.
 */
export async function readLocalSamples(samplesDir: string, hooks: SourceHooks = {}): Promise<SourceItem[]> {
  const entries = await readdir(samplesDir, { withFileTypes: true }).catch(() => undefined);
  if (!entries) {
    hooks.onWarning?.(`Samples directory not found: ${samplesDir}`);
    return [];
  }

  const names = entries
    .filter(entry => entry.isFile() && SAMPLE_EXTENSIONS.has(extname(entry.name).toLowerCase()))
    .map(entry => entry.name)
    .sort();

  const items: SourceItem[] = [];
  for (const name of names) {
    const path = join(samplesDir, name);
    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      hooks.onWarning?.(`Failed to read ${path}: ${message}`);
      continue;
    }
    items.push({
      id: name,
      title: name.slice(0, name.length - extname(name).length),
      source: LOCAL_SOURCE,
      raw,
    });
  }
  return items;
}

export function createLocalSource(samplesDir: string = DEFAULT_SAMPLES_DIR, hooks: SourceHooks = {}): ItemSource {
  return {
    name: 'local',
    fetch: () => readLocalSamples(samplesDir, hooks),
  };
}

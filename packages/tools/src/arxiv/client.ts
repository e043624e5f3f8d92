import { createHash } from 'node:crypto';
import { parseStringPromise } from 'xml2js';
import { z } from 'zod';
import { fetchWithRetry } from '../retry.js';
import { SourceError, type ArxivConfig, type ItemSource, type SourceHooks, type SourceItem } from '../types.js';

const ARXIV_API_URL = 'https://export.arxiv.org/api/query';

export const DEFAULT_ARXIV_QUERY = 'all:exoplanet';
export const DEFAULT_ARXIV_MAX_RESULTS = 5;

export const ARXIV_MOCK_ENTRY: Readonly<SourceItem> = Object.freeze({
  id: 'arxiv_demo_1',
  title: 'Mock arXiv: Example Exoplanet Study',
  source: 'arxiv_mock',
  raw:
    'Mock abstract: We report a transit detection of a temperate exoplanet. ' +
    'Measurements indicate a radius of ~1.8 Earth radii and an orbital period of 14.7 days. ' +
    'Analysis used transit photometry and simple atmospheric retrieval.',
});

// Parsed with ignoreAttrs, so every element is an array of text nodes or child objects.
const TextNodes = z.array(z.string()).optional();

const AtomEntrySchema = z.object({
  id: TextNodes,
  title: TextNodes,
  summary: TextNodes,
}).passthrough();

const AtomFeedSchema = z.object({
  feed: z.object({
    entry: z.array(AtomEntrySchema).optional(),
  }).passthrough(),
});

/** Stable, filesystem-safe id derived from the arXiv entry id. */
export function arxivItemId(entryId: string): string {
  return 'arxiv_' + createHash('sha1').update(entryId, 'utf-8').digest('hex').slice(0, 12);
}

/** Parse an arXiv Atom feed into source items. */
export async function parseArxivFeed(xml: string): Promise<SourceItem[]> {
  const parsed: unknown = await parseStringPromise(xml, {
    ignoreAttrs: true,
    trim: true,
    normalize: true,
  });

  const result = AtomFeedSchema.safeParse(parsed);
  if (!result.success) {
    throw new SourceError('arxiv', 'Unexpected arXiv feed structure');
  }

  return (result.data.feed.entry ?? []).map(entry => {
    const title = entry.title?.[0] || 'arXiv Entry';
    const summary = entry.summary?.[0] ?? '';
    return {
      id: arxivItemId(entry.id?.[0] || title),
      title,
      source: 'arxiv',
      raw: `${title}\n\n${summary}`,
    };
  });
}

export async function fetchArxivEntries(
  query: string,
  maxResults: number,
  abortSignal?: AbortSignal,
): Promise<SourceItem[]> {
  const params = new URLSearchParams({
    search_query: query,
    max_results: String(maxResults),
  });

  let xml: string;
  try {
    const response = await fetchWithRetry(
      `${ARXIV_API_URL}?${params.toString()}`,
      {
        headers: { 'Accept': 'application/atom+xml' },
        signal: abortSignal,
      },
      { maxRetries: 2, initialDelayMs: 1000 },
    );
    xml = await response.text();
  } catch (err) {
    if (err instanceof Error && err.name === 'AbortError') throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new SourceError('arxiv', `arXiv request failed: ${message}`, { cause: err });
  }

  try {
    return await parseArxivFeed(xml);
  } catch (err) {
    if (err instanceof SourceError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new SourceError('arxiv', `Failed to parse arXiv feed: ${message}`, { cause: err });
  }
}

/** arXiv source. Demo mode and any live failure return the mock entry. */
export function createArxivSource(config: ArxivConfig, hooks: SourceHooks = {}): ItemSource {
  return {
    name: 'arxiv',
    fetch: async context => {
      if (config.demoMode) {
        return [{ ...ARXIV_MOCK_ENTRY }];
      }
      try {
        return await fetchArxivEntries(config.query, config.maxResults, context?.abortSignal);
      } catch (err) {
        if (err instanceof Error && err.name === 'AbortError') throw err;
        const message = err instanceof Error ? err.message : String(err);
        hooks.onWarning?.(`${message}. Falling back to mock arXiv entry.`);
        return [{ ...ARXIV_MOCK_ENTRY }];
      }
    },
  };
}

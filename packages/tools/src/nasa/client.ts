import { z } from 'zod';
import { fetchWithRetry } from '../retry.js';
import { SourceError, type ItemSource, type NasaConfig, type SourceHooks, type SourceItem } from '../types.js';

const APOD_URL = 'https://api.nasa.gov/planetary/apod';

export const DEFAULT_MISSION = 'JWST';

const ApodResponseSchema = z.object({
  title: z.string().optional(),
  explanation: z.string().optional(),
}).passthrough();

export function mockApod(): SourceItem {
  return {
    id: 'nasa_apod_mock',
    title: 'Mock APOD: Pillars of Creation',
    source: 'nasa_apod_mock',
    raw:
      'Synthetic APOD entry. Description: The Pillars of Creation observed ' +
      'in infrared wavelengths reveal complex star-forming regions.',
  };
}

export function mockMission(mission: string): SourceItem {
  return {
    id: `nasa_mission_${mission.toLowerCase()}_mock`,
    title: `Mock NASA Mission: ${mission}`,
    source: 'nasa_mission_mock',
    raw:
      `Synthetic mission update for ${mission}. ` +
      'Instrumentation reports stable telemetry and recent spectroscopic measurements.',
  };
}

/** Today's Astronomy Picture of the Day as a source item. Throws SourceError. */
export async function fetchLiveApod(apiKey: string, abortSignal?: AbortSignal): Promise<SourceItem> {
  const params = new URLSearchParams({ api_key: apiKey });

  let body: unknown;
  try {
    const response = await fetchWithRetry(
      `${APOD_URL}?${params.toString()}`,
      {
        headers: { 'Accept': 'application/json' },
        signal: abortSignal,
      },
      { maxRetries: 1, initialDelayMs: 1000, timeoutMs: 8000 },
    );
    body = await response.json();
  } catch (err) {
    if (err instanceof Error && err.name === 'AbortError') throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new SourceError('nasa_apod', `NASA APOD request failed: ${message}`, { cause: err });
  }

  const result = ApodResponseSchema.safeParse(body);
  if (!result.success) {
    throw new SourceError('nasa_apod', 'Unexpected NASA APOD response');
  }

  const title = result.data.title ?? 'NASA APOD';
  return {
    id: 'nasa_apod_live',
    title,
    source: 'nasa_apod',
    raw: `${title}\n\n${result.data.explanation ?? ''}`,
  };
}

/**
 * APOD with fallbacks: demo mode or a missing key return the mock without a
 * request; a failed request returns the mock and warns.
 */
export async function fetchApod(
  config: Pick<NasaConfig, 'demoMode' | 'apiKey'>,
  hooks: SourceHooks = {},
  abortSignal?: AbortSignal,
): Promise<SourceItem> {
  if (config.demoMode) {
    return mockApod();
  }
  if (!config.apiKey) {
    hooks.onWarning?.('NASA_API_KEY not set. Falling back to mock APOD.');
    return mockApod();
  }
  try {
    return await fetchLiveApod(config.apiKey, abortSignal);
  } catch (err) {
    if (err instanceof Error && err.name === 'AbortError') throw err;
    const message = err instanceof Error ? err.message : String(err);
    hooks.onWarning?.(`${message}. Falling back to mock APOD.`);
    return mockApod();
  }
}

/** Mission updates have no live endpoint; always the mock item. */
export function fetchMission(mission: string = DEFAULT_MISSION): SourceItem {
  return mockMission(mission);
}

export function createApodSource(config: NasaConfig, hooks: SourceHooks = {}): ItemSource {
  return {
    name: 'nasa_apod',
    fetch: async context => [await fetchApod(config, hooks, context?.abortSignal)],
  };
}

export function createMissionSource(config: NasaConfig): ItemSource {
  return {
    name: 'nasa_mission',
    fetch: async () => [fetchMission(config.mission)],
  };
}

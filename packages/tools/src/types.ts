import type { FetchContext, ItemSource, SourceItem } from '@starsift/core';

export type { FetchContext, ItemSource, SourceItem };

/** Built-in source names accepted by the registry and the CLI. */
export const SOURCE_NAMES = ['local', 'arxiv', 'nasa_apod', 'nasa_mission'] as const;

export type SourceName = (typeof SOURCE_NAMES)[number];

export interface ArxivConfig {
  /** Return the mock entry instead of calling the API. */
  demoMode: boolean;
  /** arXiv search query, e.g. `all:exoplanet`. */
  query: string;
  maxResults: number;
}

export interface NasaConfig {
  demoMode: boolean;
  apiKey?: string;
  /** Mission name for the mission source. */
  mission: string;
}

export interface SourcesConfig {
  samplesDir: string;
  arxiv: ArxivConfig;
  nasa: NasaConfig;
}

export interface SourceHooks {
  /** A source degraded (fallback to mock data, missing directory, unreadable file). */
  onWarning?: (message: string) => void;
  /** A source failed outright and contributed no items. */
  onSourceError?: (error: SourceError) => void;
  /** A requested source name is not registered. */
  onUnknownSource?: (name: string) => void;
}

export class SourceError extends Error {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SourceError';
    this.source = source;
  }
}

export {
  type FetchContext,
  type ItemSource,
  type SourceItem,
  type SourceName,
  type ArxivConfig,
  type NasaConfig,
  type SourcesConfig,
  type SourceHooks,
  SOURCE_NAMES,
  SourceError,
} from './types.js';

export { SourceRegistry, createDefaultRegistry, dedupeItems } from './registry.js';

export { DEFAULT_SAMPLES_DIR, LOCAL_SOURCE, readLocalSamples, createLocalSource } from './local/source.js';

export {
  DEFAULT_ARXIV_QUERY,
  DEFAULT_ARXIV_MAX_RESULTS,
  ARXIV_MOCK_ENTRY,
  arxivItemId,
  parseArxivFeed,
  fetchArxivEntries,
  createArxivSource,
} from './arxiv/client.js';

export {
  DEFAULT_MISSION,
  mockApod,
  mockMission,
  fetchLiveApod,
  fetchApod,
  fetchMission,
  createApodSource,
  createMissionSource,
} from './nasa/client.js';

export { fetchWithRetry, type FetchRetryConfig } from './retry.js';

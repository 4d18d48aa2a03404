import { createChildLogger } from '@toolscout/shared/src/logger.js';
import type { AppConfig } from '@toolscout/schemas/src/config-loader.js';
import type { SourceSettings } from '@toolscout/schemas/src/retrieval-config.schema.js';
import { createFirestoreClient } from '../../infrastructure/firestore-client.js';
import { createFirestoreSearchCacheRepository } from '../../infrastructure/firestore-search-cache.repository.js';
import { createInMemorySearchCacheRepository } from '../../repositories/in-memory-search-cache.repository.js';
import type { SearchCacheRepository } from '../../repositories/search-cache.repository.js';
import type { RetrievalSources } from '../retrieval/types.js';
import { createCachedSearchSource } from './cached-search-source.js';
import { createFirecrawlSearchSource } from './firecrawl-search-source.js';
import { createMockSearchSource } from './mock-search-source.js';
import { createSerperSearchSource } from './serper-search-source.js';
import type { FetchFn, HttpSourceConfig, SearchSource } from './types.js';

const log = createChildLogger('search-sources:factory');

export interface SearchSourceFactoryDeps {
  /** Overrides the cache backend named in configuration. */
  readonly cache?: SearchCacheRepository;
  readonly fetchFn?: FetchFn;
}

/**
 * `timeoutMs` bounds the whole source call, retries included. Each attempt gets
 * `attemptTimeoutMs`, or an equal share of the call budget when that is unset.
 */
export function resolveAttemptTimeoutMs(settings: SourceSettings): number {
  const perAttempt =
    settings.attemptTimeoutMs ?? Math.ceil(settings.timeoutMs / settings.maxRetries);
  return Math.min(perAttempt, settings.timeoutMs);
}

function toHttpConfig(settings: SourceSettings, apiKey: string | null, fetchFn?: FetchFn): HttpSourceConfig {
  return {
    apiKey: apiKey ?? '',
    baseUrl: settings.baseUrl,
    timeoutMs: resolveAttemptTimeoutMs(settings),
    maxResults: settings.maxResults,
    maxRetries: settings.maxRetries,
    retryBaseDelayMs: settings.retryBaseDelayMs,
    fetchFn,
  };
}

function resolveCache(config: AppConfig, deps: SearchSourceFactoryDeps): SearchCacheRepository | null {
  const { cache } = config.retrieval;
  if (!cache.enabled) {
    return null;
  }
  if (deps.cache) {
    return deps.cache;
  }
  return cache.backend === 'firestore'
    ? createFirestoreSearchCacheRepository(createFirestoreClient())
    : createInMemorySearchCacheRepository();
}

/**
 * Builds the primary and secondary sources from configuration. Disabled roles
 * are left undefined; in mock mode both roles get in-process canned sources.
 */
export function createSearchSources(
  config: AppConfig,
  deps: SearchSourceFactoryDeps = {},
): RetrievalSources {
  const { sources } = config.retrieval;

  let primary: SearchSource | undefined;
  let secondary: SearchSource | undefined;

  if (config.mockSources) {
    primary = sources.primary.enabled ? createMockSearchSource({ name: 'mock-primary' }) : undefined;
    secondary = sources.secondary.enabled
      ? createMockSearchSource({ name: 'mock-secondary', defaultHitCount: 3 })
      : undefined;
  } else {
    primary = sources.primary.enabled
      ? createFirecrawlSearchSource(
          toHttpConfig(sources.primary, config.credentials.firecrawlApiKey, deps.fetchFn),
        )
      : undefined;
    secondary = sources.secondary.enabled
      ? createSerperSearchSource(
          toHttpConfig(sources.secondary, config.credentials.serperApiKey, deps.fetchFn),
        )
      : undefined;
  }

  const cache = resolveCache(config, deps);
  if (cache) {
    const ttlMs = config.retrieval.cache.ttlMs;
    primary = primary ? createCachedSearchSource(primary, cache, { ttlMs }) : undefined;
    secondary = secondary ? createCachedSearchSource(secondary, cache, { ttlMs }) : undefined;
  }

  log.info(
    {
      primary: primary?.name ?? null,
      secondary: secondary?.name ?? null,
      cache: cache ? config.retrieval.cache.backend : null,
    },
    'Search sources ready',
  );

  return { primary, secondary };
}

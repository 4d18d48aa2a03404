import { createChildLogger } from '@toolscout/shared/src/logger.js';
import type { SourceHit } from '@toolscout/shared/src/types/retrieval.types.js';
import type { SearchCacheRepository } from '../../repositories/search-cache.repository.js';
import type { SearchOptions, SearchSource } from './types.js';

const log = createChildLogger('search-sources:cache');

export interface CachedSearchSourceConfig {
  readonly ttlMs: number;
}

export function buildCacheKey(sourceName: string, query: string, limit: number): string {
  const normalized = query.toLowerCase().replace(/\s+/g, ' ').trim();
  return `${sourceName}|${String(limit)}|${normalized}`;
}

/**
 * Serves repeated queries from a cache. Cache trouble never fails a search:
 * read and write errors are logged and the live source answers instead.
 */
export function createCachedSearchSource(
  source: SearchSource,
  cache: SearchCacheRepository,
  config: CachedSearchSourceConfig,
): SearchSource {
  return {
    name: source.name,

    async search(query: string, limit: number, options?: SearchOptions): Promise<readonly SourceHit[]> {
      const key = buildCacheKey(source.name, query, limit);

      try {
        const cached = await cache.get(key);
        if (cached) {
          log.debug({ source: source.name, query }, 'Search cache hit');
          return cached.hits;
        }
      } catch (error) {
        log.warn(
          { source: source.name, error: error instanceof Error ? error.message : String(error) },
          'Search cache read failed',
        );
      }

      const hits = await source.search(query, limit, options);

      try {
        await cache.set(key, hits, config.ttlMs);
      } catch (error) {
        log.warn(
          { source: source.name, error: error instanceof Error ? error.message : String(error) },
          'Search cache write failed',
        );
      }

      return hits;
    },
  };
}

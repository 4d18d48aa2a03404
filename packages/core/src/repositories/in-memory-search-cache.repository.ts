import type { CachedSourceHits, SourceHit } from '@toolscout/shared/src/types/retrieval.types.js';
import type { SearchCacheRepository } from './search-cache.repository.js';

export function createInMemorySearchCacheRepository(): SearchCacheRepository {
  const cache = new Map<string, CachedSourceHits>();

  return {
    get(key: string): Promise<CachedSourceHits | null> {
      const entry = cache.get(key);

      if (!entry) {
        return Promise.resolve(null);
      }

      if (entry.expiresAt.getTime() < Date.now()) {
        cache.delete(key);
        return Promise.resolve(null);
      }

      return Promise.resolve(entry);
    },

    set(key: string, hits: readonly SourceHit[], ttlMs: number): Promise<void> {
      const now = Date.now();
      cache.set(key, {
        key,
        hits: hits.map((hit) => ({ ...hit })),
        cachedAt: new Date(now),
        expiresAt: new Date(now + ttlMs),
      });
      return Promise.resolve();
    },
  };
}

import type { CachedSourceHits, SourceHit } from '@toolscout/shared/src/types/retrieval.types.js';

export interface SearchCacheRepository {
  get(key: string): Promise<CachedSourceHits | null>;
  set(key: string, hits: readonly SourceHit[], ttlMs: number): Promise<void>;
}

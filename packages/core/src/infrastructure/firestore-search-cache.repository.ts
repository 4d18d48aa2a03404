import { createHash } from 'node:crypto';
import type { Firestore } from '@google-cloud/firestore';
import { Timestamp } from '@google-cloud/firestore';
import type { CachedSourceHits, SourceHit } from '@toolscout/shared/src/types/retrieval.types.js';
import { PersistenceError, toError } from '@toolscout/shared/src/utils/errors.js';
import type { SearchCacheRepository } from '../repositories/search-cache.repository.js';
import { createChildLogger } from '@toolscout/shared/src/logger.js';

const log = createChildLogger('firestore:search-cache');

const COLLECTION = 'search-cache';

interface CacheDocument {
  key: string;
  hits: SourceHit[];
  cachedAt: Timestamp;
  expiresAt: Timestamp;
}

function hashKey(key: string): string {
  return createHash('sha256').update(key).digest('hex');
}

function fromDoc(data: CacheDocument): CachedSourceHits {
  return {
    key: data.key,
    hits: data.hits,
    cachedAt: data.cachedAt.toDate(),
    expiresAt: data.expiresAt.toDate(),
  };
}

export function createFirestoreSearchCacheRepository(db: Firestore): SearchCacheRepository {
  const collectionRef = db.collection(COLLECTION);

  return {
    async get(key: string): Promise<CachedSourceHits | null> {
      try {
        const doc = await collectionRef.doc(hashKey(key)).get();

        if (!doc.exists) {
          return null;
        }

        const result = fromDoc(doc.data() as CacheDocument);

        if (result.expiresAt.getTime() < Date.now()) {
          log.debug({ key }, 'Cache entry expired');
          return null;
        }

        return result;
      } catch (error) {
        throw new PersistenceError(`Failed to read search cache entry: ${key}`, toError(error));
      }
    },

    async set(key: string, hits: readonly SourceHit[], ttlMs: number): Promise<void> {
      const now = Timestamp.now();
      const docData: CacheDocument = {
        key,
        hits: hits.map((hit) => ({ ...hit })),
        cachedAt: now,
        expiresAt: Timestamp.fromMillis(now.toMillis() + ttlMs),
      };

      try {
        await collectionRef.doc(hashKey(key)).set(docData);
      } catch (error) {
        throw new PersistenceError(`Failed to write search cache entry: ${key}`, toError(error));
      }
    },
  };
}

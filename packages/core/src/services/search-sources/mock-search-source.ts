import { createChildLogger } from '@toolscout/shared/src/logger.js';
import type { SourceHit } from '@toolscout/shared/src/types/retrieval.types.js';
import type { SearchSource } from './types.js';

const log = createChildLogger('search-sources:mock');

export type MockSearchHit = Omit<SourceHit, 'position'>;

export interface MockSearchSourceOptions {
  readonly name?: string;
  /** Canned hits per exact query string. */
  readonly responses?: ReadonlyMap<string, readonly MockSearchHit[]>;
  /** Hits generated for queries without a canned response. */
  readonly defaultHitCount?: number;
}

function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

function defaultHits(name: string, query: string, count: number): MockSearchHit[] {
  const slug = slugify(query) || 'query';
  return Array.from({ length: count }, (_, i) => ({
    title: `Mock ${name} result ${String(i + 1)} for ${query}`,
    url: `https://example.com/${name}/${slug}/${String(i + 1)}`,
    body: `Mock ${name} content about ${query}.`,
  }));
}

export function createMockSearchSource(options: MockSearchSourceOptions = {}): SearchSource {
  const name = options.name ?? 'mock';
  const defaultHitCount = options.defaultHitCount ?? 5;

  log.info({ name }, 'Using mock search source');

  return {
    name,

    search(query: string, limit: number): Promise<readonly SourceHit[]> {
      log.debug({ name, query, limit }, 'Mock search');

      const hits = options.responses?.get(query) ?? defaultHits(name, query, defaultHitCount);
      return Promise.resolve(
        hits.slice(0, limit).map((hit, index) => ({ ...hit, position: index + 1 })),
      );
    },
  };
}

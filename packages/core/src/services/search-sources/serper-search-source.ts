import { z } from 'zod';
import { createChildLogger } from '@toolscout/shared/src/logger.js';
import { ConfigurationError, SourceError } from '@toolscout/shared/src/utils/errors.js';
import type { SourceHit } from '@toolscout/shared/src/types/retrieval.types.js';
import { formatZodErrors } from '@toolscout/schemas/src/validators.js';
import { postJson } from './http-client.js';
import type { HttpSourceConfig, SearchOptions, SearchSource } from './types.js';

const log = createChildLogger('search-sources:serper');

export const SERPER_SOURCE_NAME = 'serper';

const SerperOrganicResultSchema = z.object({
  title: z.string().default(''),
  link: z.string().default(''),
  snippet: z.string().default(''),
  position: z.number().optional(),
});

const SerperSearchResponseSchema = z.object({
  organic: z.array(SerperOrganicResultSchema).default([]),
});

export function createSerperSearchSource(config: HttpSourceConfig): SearchSource {
  if (!config.apiKey) {
    throw new ConfigurationError('API key is required for the Serper search source');
  }

  const endpoint = `${config.baseUrl.replace(/\/+$/, '')}/search`;

  return {
    name: SERPER_SOURCE_NAME,

    async search(query: string, limit: number, options?: SearchOptions): Promise<readonly SourceHit[]> {
      const num = Math.min(limit, config.maxResults);
      log.debug({ query, num }, 'Executing Serper search');

      const raw = await postJson({
        source: SERPER_SOURCE_NAME,
        url: endpoint,
        headers: { 'X-API-KEY': config.apiKey },
        body: { q: query, num },
        timeoutMs: config.timeoutMs,
        maxRetries: config.maxRetries,
        retryBaseDelayMs: config.retryBaseDelayMs,
        signal: options?.signal,
        fetchFn: config.fetchFn,
      });

      const parsed = SerperSearchResponseSchema.safeParse(raw);
      if (!parsed.success) {
        throw new SourceError(
          `Unexpected Serper response: ${formatZodErrors(parsed.error).join('; ')}`,
          SERPER_SOURCE_NAME,
          false,
        );
      }

      // Positions are renumbered from the trimmed list; Serper's own numbering
      // can skip entries it filtered out.
      const hits = parsed.data.organic.slice(0, num).map(
        (result, index): SourceHit => ({
          title: result.title,
          url: result.link,
          body: result.snippet,
          position: index + 1,
        }),
      );
      log.debug({ query, hitCount: hits.length }, 'Serper search completed');
      return hits;
    },
  };
}

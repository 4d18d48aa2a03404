import { z } from 'zod';
import { createChildLogger } from '@toolscout/shared/src/logger.js';
import { ConfigurationError, SourceError } from '@toolscout/shared/src/utils/errors.js';
import type { SourceHit } from '@toolscout/shared/src/types/retrieval.types.js';
import { formatZodErrors } from '@toolscout/schemas/src/validators.js';
import { postJson } from './http-client.js';
import type { HttpSourceConfig, SearchOptions, SearchSource } from './types.js';

const log = createChildLogger('search-sources:firecrawl');

export const FIRECRAWL_SOURCE_NAME = 'firecrawl';

const FirecrawlDocumentSchema = z.object({
  url: z.string().optional(),
  title: z.string().nullish(),
  description: z.string().nullish(),
  markdown: z.string().nullish(),
  metadata: z
    .object({
      title: z.string().nullish(),
      sourceURL: z.string().nullish(),
    })
    .passthrough()
    .optional(),
});

const FirecrawlSearchResponseSchema = z.object({
  success: z.boolean(),
  data: z.array(FirecrawlDocumentSchema).default([]),
  warning: z.string().nullish(),
  error: z.string().nullish(),
});

type FirecrawlDocument = z.infer<typeof FirecrawlDocumentSchema>;

function toHit(doc: FirecrawlDocument, index: number): SourceHit {
  return {
    title: doc.title ?? doc.metadata?.title ?? '',
    url: doc.url ?? doc.metadata?.sourceURL ?? '',
    body: doc.markdown ?? doc.description ?? '',
    position: index + 1,
  };
}

/**
 * Primary source. Firecrawl's search endpoint scrapes each result page, so hits
 * carry full markdown bodies rather than snippets.
 */
export function createFirecrawlSearchSource(config: HttpSourceConfig): SearchSource {
  if (!config.apiKey) {
    throw new ConfigurationError('API key is required for the Firecrawl search source');
  }

  const endpoint = `${config.baseUrl.replace(/\/+$/, '')}/v1/search`;

  return {
    name: FIRECRAWL_SOURCE_NAME,

    async search(query: string, limit: number, options?: SearchOptions): Promise<readonly SourceHit[]> {
      const cappedLimit = Math.min(limit, config.maxResults);
      log.debug({ query, limit: cappedLimit }, 'Executing Firecrawl search');

      const raw = await postJson({
        source: FIRECRAWL_SOURCE_NAME,
        url: endpoint,
        headers: { Authorization: `Bearer ${config.apiKey}` },
        body: {
          query,
          limit: cappedLimit,
          scrapeOptions: { formats: ['markdown'] },
        },
        timeoutMs: config.timeoutMs,
        maxRetries: config.maxRetries,
        retryBaseDelayMs: config.retryBaseDelayMs,
        signal: options?.signal,
        fetchFn: config.fetchFn,
      });

      const parsed = FirecrawlSearchResponseSchema.safeParse(raw);
      if (!parsed.success) {
        throw new SourceError(
          `Unexpected Firecrawl response: ${formatZodErrors(parsed.error).join('; ')}`,
          FIRECRAWL_SOURCE_NAME,
          false,
        );
      }
      if (!parsed.data.success) {
        throw new SourceError(
          `Firecrawl search failed: ${parsed.data.error ?? 'unknown error'}`,
          FIRECRAWL_SOURCE_NAME,
          false,
        );
      }
      if (parsed.data.warning) {
        log.warn({ query, warning: parsed.data.warning }, 'Firecrawl search returned a warning');
      }

      const hits = parsed.data.data.slice(0, cappedLimit).map(toHit);
      log.debug({ query, hitCount: hits.length }, 'Firecrawl search completed');
      return hits;
    },
  };
}

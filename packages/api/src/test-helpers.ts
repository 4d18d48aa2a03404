import type { OpenAPIHono } from '@hono/zod-openapi';
import { createMockSearchSource } from '@toolscout/core/src/services/search-sources/mock-search-source.js';
import { createRetrievalOrchestrator } from '@toolscout/core/src/services/retrieval/retrieval-orchestrator.js';
import { createToolSearchService } from '@toolscout/core/src/services/retrieval/tool-search-service.js';
import type { RetrievalSources } from '@toolscout/core/src/services/retrieval/types.js';
import { createApp } from './app.js';
import type { AppEnv } from './types.js';

/**
 * Creates an app over in-process search sources. Defaults to canned mock
 * sources for both roles. For use in unit tests only.
 */
export function createTestApp(
  sources: RetrievalSources = {
    primary: createMockSearchSource({ name: 'mock-primary' }),
    secondary: createMockSearchSource({ name: 'mock-secondary', defaultHitCount: 2 }),
  },
): OpenAPIHono<AppEnv> {
  const orchestrator = createRetrievalOrchestrator(sources, {
    secondaryMinHits: 3,
    primaryTimeoutMs: 1000,
    secondaryTimeoutMs: 1000,
  });
  const searchService = createToolSearchService({ orchestrator }, { defaultLimit: 5 });

  return createApp({ searchService });
}

export function jsonPost(body: Record<string, unknown>): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}

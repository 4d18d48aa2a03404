import type { AppConfig } from '@toolscout/schemas/src/config-loader.js';
import { createSearchSources } from '../search-sources/source-factory.js';
import type { SearchSourceFactoryDeps } from '../search-sources/source-factory.js';
import { createRetrievalOrchestrator } from './retrieval-orchestrator.js';
import { createToolSearchService } from './tool-search-service.js';
import type { ToolSearchService } from './types.js';

export function createConfiguredToolSearchService(
  config: AppConfig,
  deps: SearchSourceFactoryDeps = {},
): ToolSearchService {
  const { search, sources } = config.retrieval;

  const orchestrator = createRetrievalOrchestrator(createSearchSources(config, deps), {
    secondaryMinHits: search.secondaryMinHits,
    primaryTimeoutMs: sources.primary.timeoutMs,
    secondaryTimeoutMs: sources.secondary.timeoutMs,
  });

  return createToolSearchService({ orchestrator }, { defaultLimit: search.defaultLimit });
}

import { createChildLogger } from '@toolscout/shared/src/logger.js';
import type { QueryAnalysis } from '@toolscout/shared/src/types/query.types.js';
import type { RetrievalResult } from '@toolscout/shared/src/types/retrieval.types.js';
import { QueryValidationError } from '@toolscout/shared/src/utils/errors.js';
import { classifyQuery, validateQuery } from '../../query/classifier.js';
import type { QueryClassifier } from '../../query/classifier.js';
import { synthesizeQueries } from '../../query/synthesizer.js';
import type { ToolSearchService, ToolSearchServiceConfig, ToolSearchServiceDeps } from './types.js';

const log = createChildLogger('retrieval:tool-search');

const defaultClassifier: QueryClassifier = { classify: classifyQuery, validate: validateQuery };

export function createToolSearchService(
  deps: ToolSearchServiceDeps,
  config: ToolSearchServiceConfig,
): ToolSearchService {
  const classifier = deps.classifier ?? defaultClassifier;

  function assertRetrievable(text: string, limit: number): void {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new QueryValidationError(`Limit must be a positive integer, got ${String(limit)}`, text);
    }
    if (!classifier.validate(text)) {
      throw new QueryValidationError(
        'Query must have at least 2 characters and mostly letters, digits or spaces',
        text,
      );
    }
  }

  const service: ToolSearchService = {
    analyze(text: string): QueryAnalysis {
      const isValid = classifier.validate(text);
      const classified = classifier.classify(text);
      const synthesized = isValid ? synthesizeQueries(classified) : null;

      return Object.freeze({
        ...classified,
        searchQuery: synthesized?.searchQuery ?? null,
        articleQuery: synthesized?.articleQuery ?? null,
        isValid,
      });
    },

    async retrieve(text: string, limit: number = config.defaultLimit): Promise<RetrievalResult> {
      assertRetrievable(text, limit);

      const classified = classifier.classify(text);
      const synthesized = synthesizeQueries(classified);
      log.info(
        {
          query: text,
          intent: classified.intent,
          domain: classified.domain,
          searchQuery: synthesized.searchQuery,
          limit,
        },
        'Retrieving tool search results',
      );

      return deps.orchestrator.retrieve(classified, synthesized, limit);
    },

    searchAlternatives(tool: string, limit?: number): Promise<RetrievalResult> {
      return service.retrieve(`${tool.trim()} alternatives`, limit);
    },

    searchComparison(tool1: string, tool2: string, limit?: number): Promise<RetrievalResult> {
      return service.retrieve(`${tool1.trim()} vs ${tool2.trim()}`, limit);
    },

    async searchArticles(text: string, limit: number = config.defaultLimit): Promise<RetrievalResult> {
      assertRetrievable(text, limit);

      const synthesized = synthesizeQueries(classifier.classify(text));
      log.info({ query: text, articleQuery: synthesized.articleQuery, limit }, 'Searching articles');

      return deps.orchestrator.retrieveArticles(synthesized, limit);
    },
  };

  return service;
}

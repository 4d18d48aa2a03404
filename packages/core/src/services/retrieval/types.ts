import type {
  ClassifiedQuery,
  QueryAnalysis,
  SynthesizedQueries,
} from '@toolscout/shared/src/types/query.types.js';
import type { RetrievalResult } from '@toolscout/shared/src/types/retrieval.types.js';
import type { QueryClassifier } from '../../query/classifier.js';
import type { SearchSource } from '../search-sources/types.js';

/** A role left undefined is disabled; the other source then works alone. */
export interface RetrievalSources {
  readonly primary?: SearchSource;
  readonly secondary?: SearchSource;
}

export interface RetrievalOrchestratorConfig {
  /** Primary hit count below which the secondary source is also queried. */
  readonly secondaryMinHits: number;
  readonly primaryTimeoutMs: number;
  readonly secondaryTimeoutMs: number;
}

export interface RetrievalOrchestrator {
  retrieve(
    classified: ClassifiedQuery,
    synthesized: SynthesizedQueries,
    limit: number,
  ): Promise<RetrievalResult>;
  /** Primary source only, with the article query. */
  retrieveArticles(synthesized: SynthesizedQueries, limit: number): Promise<RetrievalResult>;
}

export interface ToolSearchServiceDeps {
  readonly orchestrator: RetrievalOrchestrator;
  readonly classifier?: QueryClassifier;
}

export interface ToolSearchServiceConfig {
  readonly defaultLimit: number;
}

export interface ToolSearchService {
  analyze(text: string): QueryAnalysis;
  retrieve(text: string, limit?: number): Promise<RetrievalResult>;
  searchAlternatives(tool: string, limit?: number): Promise<RetrievalResult>;
  searchComparison(tool1: string, tool2: string, limit?: number): Promise<RetrievalResult>;
  searchArticles(text: string, limit?: number): Promise<RetrievalResult>;
}

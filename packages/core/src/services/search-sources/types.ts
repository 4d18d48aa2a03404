import type { SourceHit } from '@toolscout/shared/src/types/retrieval.types.js';

export interface SearchOptions {
  /** Aborted by the caller when its deadline passes. */
  readonly signal?: AbortSignal;
}

export interface SearchSource {
  /** Provider name, used in logs, cache keys and source reports. */
  readonly name: string;
  search(query: string, limit: number, options?: SearchOptions): Promise<readonly SourceHit[]>;
}

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpSourceConfig {
  readonly apiKey: string;
  readonly baseUrl: string;
  /** Per attempt; the orchestrator bounds the whole call. */
  readonly timeoutMs: number;
  readonly maxResults: number;
  readonly maxRetries: number;
  readonly retryBaseDelayMs: number;
  readonly fetchFn?: FetchFn;
}

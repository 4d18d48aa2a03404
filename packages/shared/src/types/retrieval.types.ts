export type SourceRole = 'primary' | 'secondary';

/** A result item as a search source returns it, before it is tagged with a role. */
export interface SourceHit {
  readonly title: string;
  readonly url: string;
  readonly body: string;
  /** 1-based rank within the source's own result list. */
  readonly position: number;
}

export interface RawHit extends SourceHit {
  readonly source: SourceRole;
  readonly provider: string;
}

export interface RankedDocument extends RawHit {
  readonly score: number;
}

export type SourceStatus = 'ok' | 'failed' | 'skipped' | 'disabled';

export interface SourceReport {
  readonly source: SourceRole;
  /** Adapter name; null when no source is configured for the role. */
  readonly provider: string | null;
  readonly status: SourceStatus;
  readonly hitCount: number;
  readonly error?: string;
}

export interface RetrievalResult {
  readonly query: string;
  readonly documents: readonly RankedDocument[];
  readonly sources: readonly SourceReport[];
}

export interface CachedSourceHits {
  readonly key: string;
  readonly hits: readonly SourceHit[];
  readonly cachedAt: Date;
  readonly expiresAt: Date;
}

import { createChildLogger } from '@toolscout/shared/src/logger.js';
import type {
  ClassifiedQuery,
  QueryIntent,
  SynthesizedQueries,
} from '@toolscout/shared/src/types/query.types.js';
import type {
  RawHit,
  RetrievalResult,
  SourceReport,
  SourceRole,
} from '@toolscout/shared/src/types/retrieval.types.js';
import { SourceError, toError } from '@toolscout/shared/src/utils/errors.js';
import type { SearchSource } from '../search-sources/types.js';
import { mergeHits } from './merge-rank.js';
import type {
  RetrievalOrchestrator,
  RetrievalOrchestratorConfig,
  RetrievalSources,
} from './types.js';

const log = createChildLogger('retrieval:orchestrator');

const SECONDARY_INTENTS: ReadonlySet<QueryIntent> = new Set(['alternatives', 'comparison']);

type SourceOutcome =
  | { readonly status: 'ok'; readonly provider: string; readonly hits: readonly RawHit[] }
  | { readonly status: 'failed'; readonly provider: string; readonly error: string }
  | { readonly status: 'skipped'; readonly provider: string | null }
  | { readonly status: 'disabled' };

function hitsOf(outcome: SourceOutcome): readonly RawHit[] {
  return outcome.status === 'ok' ? outcome.hits : [];
}

function toReport(role: SourceRole, outcome: SourceOutcome): SourceReport {
  switch (outcome.status) {
    case 'ok':
      return { source: role, provider: outcome.provider, status: 'ok', hitCount: outcome.hits.length };
    case 'failed':
      return {
        source: role,
        provider: outcome.provider,
        status: 'failed',
        hitCount: 0,
        error: outcome.error,
      };
    case 'skipped':
      return { source: role, provider: outcome.provider, status: 'skipped', hitCount: 0 };
    case 'disabled':
      return { source: role, provider: null, status: 'disabled', hitCount: 0 };
  }
}

/**
 * Runs a task against a deadline. On expiry the task's signal is aborted and
 * the returned promise rejects, whether or not the task honours the signal.
 */
function runWithDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  source: string,
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      const error = new SourceError(
        `${source} did not answer within ${String(timeoutMs)}ms`,
        source,
        true,
      );
      controller.abort(error);
      reject(error);
    }, timeoutMs);

    let pending: Promise<T>;
    try {
      pending = task(controller.signal);
    } catch (error) {
      clearTimeout(timer);
      reject(toError(error));
      return;
    }

    pending.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(toError(error));
      },
    );
  });
}

export function createRetrievalOrchestrator(
  sources: RetrievalSources,
  config: RetrievalOrchestratorConfig,
): RetrievalOrchestrator {
  const timeouts: Readonly<Record<SourceRole, number>> = {
    primary: config.primaryTimeoutMs,
    secondary: config.secondaryTimeoutMs,
  };

  async function callSource(
    role: SourceRole,
    source: SearchSource | undefined,
    query: string,
    limit: number,
  ): Promise<SourceOutcome> {
    if (!source) {
      log.debug({ role }, 'Source disabled, not queried');
      return { status: 'disabled' };
    }

    log.info({ role, provider: source.name, query, limit }, 'Querying source');
    try {
      const hits = await runWithDeadline(
        (signal) => source.search(query, limit, { signal }),
        timeouts[role],
        source.name,
      );
      const tagged = hits.map(
        (hit): RawHit => Object.freeze({ ...hit, source: role, provider: source.name }),
      );
      log.info({ role, provider: source.name, hitCount: tagged.length }, 'Source returned hits');
      return { status: 'ok', provider: source.name, hits: tagged };
    } catch (error) {
      const message = toError(error).message;
      log.warn({ role, provider: source.name, error: message }, 'Source failed');
      return { status: 'failed', provider: source.name, error: message };
    }
  }

  function skipped(source: SearchSource | undefined): SourceOutcome {
    return source ? { status: 'skipped', provider: source.name } : { status: 'disabled' };
  }

  function buildResult(
    query: string,
    primary: SourceOutcome,
    secondary: SourceOutcome,
    limit: number,
  ): RetrievalResult {
    const documents = mergeHits([...hitsOf(primary), ...hitsOf(secondary)], limit);
    const reports = [toReport('primary', primary), toReport('secondary', secondary)];

    log.info(
      {
        query,
        primary: { status: primary.status, hitCount: hitsOf(primary).length },
        secondary: { status: secondary.status, hitCount: hitsOf(secondary).length },
        documentCount: documents.length,
      },
      'Retrieval complete',
    );

    return Object.freeze({
      query,
      documents: Object.freeze(documents),
      sources: Object.freeze(reports),
    });
  }

  return {
    async retrieve(
      classified: ClassifiedQuery,
      synthesized: SynthesizedQueries,
      limit: number,
    ): Promise<RetrievalResult> {
      const query = synthesized.searchQuery;

      if (SECONDARY_INTENTS.has(classified.intent)) {
        const [primary, secondary] = await Promise.all([
          callSource('primary', sources.primary, query, limit),
          callSource('secondary', sources.secondary, query, limit),
        ]);
        return buildResult(query, primary, secondary, limit);
      }

      const primary = await callSource('primary', sources.primary, query, limit);
      const primaryHitCount = hitsOf(primary).length;

      if (primaryHitCount >= config.secondaryMinHits) {
        return buildResult(query, primary, skipped(sources.secondary), limit);
      }

      log.debug(
        { primaryHitCount, secondaryMinHits: config.secondaryMinHits },
        'Primary source under threshold, querying secondary',
      );
      const secondary = await callSource('secondary', sources.secondary, query, limit);
      return buildResult(query, primary, secondary, limit);
    },

    async retrieveArticles(synthesized: SynthesizedQueries, limit: number): Promise<RetrievalResult> {
      const query = synthesized.articleQuery;
      const primary = await callSource('primary', sources.primary, query, limit);
      return buildResult(query, primary, skipped(sources.secondary), limit);
    },
  };
}

import { describe, it, expect, vi } from 'vitest';
import type { Mock } from 'vitest';
import type { SourceHit } from '@toolscout/shared/src/types/retrieval.types.js';
import { classifyQuery } from '../../query/classifier.js';
import { synthesizeQueries } from '../../query/synthesizer.js';
import type { SearchSource } from '../search-sources/types.js';
import { createRetrievalOrchestrator } from './retrieval-orchestrator.js';
import type { RetrievalOrchestratorConfig } from './types.js';

type StubSource = SearchSource & { search: Mock<SearchSource['search']> };

const config: RetrievalOrchestratorConfig = {
  secondaryMinHits: 3,
  primaryTimeoutMs: 1000,
  secondaryTimeoutMs: 1000,
};

function createHits(name: string, count: number): SourceHit[] {
  return Array.from({ length: count }, (_, i) => ({
    title: `${name} result ${String(i + 1)}`,
    url: `https://${name}.example.com/${String(i + 1)}`,
    body: 'body',
    position: i + 1,
  }));
}

function createStubSource(name: string, hitCount: number): StubSource {
  return {
    name,
    search: vi
      .fn<SearchSource['search']>()
      .mockImplementation((_query, limit) =>
        Promise.resolve(createHits(name, hitCount).slice(0, limit)),
      ),
  };
}

function prepare(text: string) {
  const classified = classifyQuery(text);
  return { classified, synthesized: synthesizeQueries(classified) };
}

describe('createRetrievalOrchestrator', () => {
  it('should query both sources for alternatives even when primary has enough hits', async () => {
    const primary = createStubSource('primary', 5);
    const secondary = createStubSource('secondary', 2);
    const orchestrator = createRetrievalOrchestrator({ primary, secondary }, config);
    const { classified, synthesized } = prepare('mlflow alternatives');

    const result = await orchestrator.retrieve(classified, synthesized, 10);

    expect(primary.search).toHaveBeenCalledWith(
      'mlflow alternatives machine learning AI',
      10,
      expect.objectContaining({ signal: expect.any(AbortSignal) }),
    );
    expect(secondary.search).toHaveBeenCalledTimes(1);
    expect(result.query).toBe('mlflow alternatives machine learning AI');
    expect(result.documents).toHaveLength(7);
    expect(result.sources).toEqual([
      { source: 'primary', provider: 'primary', status: 'ok', hitCount: 5 },
      { source: 'secondary', provider: 'secondary', status: 'ok', hitCount: 2 },
    ]);
  });

  it('should issue comparison calls concurrently', async () => {
    let releasePrimary: (hits: readonly SourceHit[]) => void = () => undefined;
    const primary: StubSource = {
      name: 'primary',
      search: vi.fn<SearchSource['search']>().mockImplementation(
        () =>
          new Promise((resolve) => {
            releasePrimary = resolve;
          }),
      ),
    };
    const secondary = createStubSource('secondary', 1);
    const orchestrator = createRetrievalOrchestrator({ primary, secondary }, config);
    const { classified, synthesized } = prepare('datadog vs newrelic');

    const pending = orchestrator.retrieve(classified, synthesized, 5);
    expect(secondary.search).toHaveBeenCalledWith(
      'datadog vs newrelic comparison features pricing',
      5,
      expect.anything(),
    );

    releasePrimary(createHits('primary', 1));
    const result = await pending;
    expect(result.documents.map((doc) => doc.provider)).toEqual(['primary', 'secondary']);
  });

  it('should skip the secondary source when primary meets the threshold', async () => {
    const primary = createStubSource('primary', 3);
    const secondary = createStubSource('secondary', 3);
    const orchestrator = createRetrievalOrchestrator({ primary, secondary }, config);
    const { classified, synthesized } = prepare('redis pricing');

    const result = await orchestrator.retrieve(classified, synthesized, 5);

    expect(secondary.search).not.toHaveBeenCalled();
    expect(result.sources[1]).toEqual({
      source: 'secondary',
      provider: 'secondary',
      status: 'skipped',
      hitCount: 0,
    });
  });

  it('should fall back to the secondary source when primary returns too few hits', async () => {
    const primary = createStubSource('primary', 2);
    const secondary = createStubSource('secondary', 4);
    const orchestrator = createRetrievalOrchestrator({ primary, secondary }, config);
    const { classified, synthesized } = prepare('redis pricing');

    const result = await orchestrator.retrieve(classified, synthesized, 3);

    expect(secondary.search).toHaveBeenCalledWith(
      'redis pricing cost plans pricing model',
      3,
      expect.anything(),
    );
    expect(result.documents).toHaveLength(3);
    expect(result.documents.slice(0, 2).map((doc) => doc.url)).toEqual([
      'https://primary.example.com/1',
      'https://primary.example.com/2',
    ]);
  });

  it('should isolate a failing primary source', async () => {
    const primary = createStubSource('primary', 0);
    primary.search.mockRejectedValue(new Error('primary exploded'));
    const secondary = createStubSource('secondary', 2);
    const orchestrator = createRetrievalOrchestrator({ primary, secondary }, config);
    const { classified, synthesized } = prepare('redis pricing');

    const result = await orchestrator.retrieve(classified, synthesized, 5);

    expect(result.documents.map((doc) => doc.source)).toEqual(['secondary', 'secondary']);
    expect(result.sources[0]).toEqual({
      source: 'primary',
      provider: 'primary',
      status: 'failed',
      hitCount: 0,
      error: 'primary exploded',
    });
  });

  it('should isolate a source that throws synchronously', async () => {
    const primary = createStubSource('primary', 2);
    const secondary: StubSource = {
      name: 'secondary',
      search: vi.fn<SearchSource['search']>().mockImplementation(() => {
        throw new Error('not ready');
      }),
    };
    const orchestrator = createRetrievalOrchestrator({ primary, secondary }, config);
    const { classified, synthesized } = prepare('mlflow alternatives');

    const result = await orchestrator.retrieve(classified, synthesized, 5);

    expect(result.documents).toHaveLength(2);
    expect(result.sources[1]).toMatchObject({ status: 'failed', error: 'not ready' });
  });

  it('should return an empty result when both sources fail', async () => {
    const primary = createStubSource('primary', 0);
    primary.search.mockRejectedValue(new Error('down'));
    const secondary = createStubSource('secondary', 0);
    secondary.search.mockRejectedValue(new Error('also down'));
    const orchestrator = createRetrievalOrchestrator({ primary, secondary }, config);
    const { classified, synthesized } = prepare('mlflow alternatives');

    const result = await orchestrator.retrieve(classified, synthesized, 5);

    expect(result.documents).toEqual([]);
    expect(result.sources.map((report) => report.status)).toEqual(['failed', 'failed']);
  });

  it('should abort and fail a source that exceeds its timeout', async () => {
    const received: { signal?: AbortSignal } = {};
    const primary: StubSource = {
      name: 'slow',
      search: vi.fn<SearchSource['search']>().mockImplementation((_query, _limit, options) => {
        received.signal = options?.signal;
        return new Promise(() => undefined);
      }),
    };
    const secondary = createStubSource('secondary', 1);
    const orchestrator = createRetrievalOrchestrator(
      { primary, secondary },
      { ...config, primaryTimeoutMs: 20 },
    );
    const { classified, synthesized } = prepare('mlflow alternatives');

    const result = await orchestrator.retrieve(classified, synthesized, 5);

    expect(received.signal?.aborted).toBe(true);
    expect(result.sources[0]).toEqual({
      source: 'primary',
      provider: 'slow',
      status: 'failed',
      hitCount: 0,
      error: 'slow did not answer within 20ms',
    });
    expect(result.sources[1]).toMatchObject({ status: 'ok', hitCount: 1 });
  });

  it('should report a missing secondary source as disabled', async () => {
    const primary = createStubSource('primary', 1);
    const orchestrator = createRetrievalOrchestrator({ primary }, config);
    const { classified, synthesized } = prepare('redis pricing');

    const result = await orchestrator.retrieve(classified, synthesized, 5);

    expect(result.documents).toHaveLength(1);
    expect(result.sources[1]).toEqual({
      source: 'secondary',
      provider: null,
      status: 'disabled',
      hitCount: 0,
    });
  });

  it('should run on the secondary source alone when primary is disabled', async () => {
    const secondary = createStubSource('secondary', 2);
    const orchestrator = createRetrievalOrchestrator({ secondary }, config);
    const { classified, synthesized } = prepare('redis pricing');

    const result = await orchestrator.retrieve(classified, synthesized, 5);

    expect(result.sources.map((report) => report.status)).toEqual(['disabled', 'ok']);
    expect(result.documents).toHaveLength(2);
  });

  it('should deduplicate hits shared by both sources', async () => {
    const shared: SourceHit = { title: 'MLflow', url: 'https://mlflow.org/', body: 'b', position: 1 };
    const primary: StubSource = {
      name: 'primary',
      search: vi.fn<SearchSource['search']>().mockResolvedValue([shared]),
    };
    const secondary: StubSource = {
      name: 'secondary',
      search: vi
        .fn<SearchSource['search']>()
        .mockResolvedValue([{ ...shared, url: 'https://MLflow.org' }]),
    };
    const orchestrator = createRetrievalOrchestrator({ primary, secondary }, config);
    const { classified, synthesized } = prepare('mlflow alternatives');

    const result = await orchestrator.retrieve(classified, synthesized, 5);

    expect(result.documents).toHaveLength(1);
    expect(result.documents[0]).toMatchObject({ url: 'https://mlflow.org/', source: 'primary' });
  });

  describe('retrieveArticles', () => {
    it('should query only the primary source with the article query', async () => {
      const primary = createStubSource('primary', 1);
      const secondary = createStubSource('secondary', 1);
      const orchestrator = createRetrievalOrchestrator({ primary, secondary }, config);
      const { synthesized } = prepare('mlflow alternatives');

      const result = await orchestrator.retrieveArticles(synthesized, 4);

      expect(primary.search).toHaveBeenCalledWith(
        'mlflow alternatives comparison best tools',
        4,
        expect.anything(),
      );
      expect(secondary.search).not.toHaveBeenCalled();
      expect(result.query).toBe('mlflow alternatives comparison best tools');
      expect(result.sources.map((report) => report.status)).toEqual(['ok', 'skipped']);
    });

    it('should return an empty result when the primary source fails', async () => {
      const primary = createStubSource('primary', 0);
      primary.search.mockRejectedValue(new Error('down'));
      const orchestrator = createRetrievalOrchestrator({ primary }, config);
      const { synthesized } = prepare('redis pricing');

      const result = await orchestrator.retrieveArticles(synthesized, 4);

      expect(result.documents).toEqual([]);
      expect(result.sources.map((report) => report.status)).toEqual(['failed', 'disabled']);
    });
  });
});

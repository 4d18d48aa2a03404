import { describe, it, expect, vi } from 'vitest';
import { resolveAppConfig } from '@toolscout/schemas/src/config-loader.js';
import { createInMemorySearchCacheRepository } from '../../repositories/in-memory-search-cache.repository.js';
import { createSearchSources, resolveAttemptTimeoutMs } from './source-factory.js';
import type { FetchFn } from './types.js';

const liveEnv = { FIRECRAWL_API_KEY: 'test-secret', SERPER_API_KEY: 'test-secret' };

describe('createSearchSources', () => {
  it('should build the live adapters when keys are present', () => {
    const sources = createSearchSources(resolveAppConfig({}, liveEnv));

    expect(sources.primary?.name).toBe('firecrawl');
    expect(sources.secondary?.name).toBe('serper');
  });

  it('should leave the secondary role empty when its key is missing', () => {
    const sources = createSearchSources(resolveAppConfig({}, { FIRECRAWL_API_KEY: 'test-secret' }));

    expect(sources.primary?.name).toBe('firecrawl');
    expect(sources.secondary).toBeUndefined();
  });

  it('should use mock sources in mock mode', async () => {
    const sources = createSearchSources(resolveAppConfig({}, { TOOLSCOUT_MOCK_SOURCES: 'true' }));

    expect(sources.primary?.name).toBe('mock-primary');
    expect(sources.secondary?.name).toBe('mock-secondary');
    expect(await sources.secondary?.search('vault', 10)).toHaveLength(3);
  });

  it('should leave disabled roles empty', () => {
    const config = resolveAppConfig(
      { sources: { primary: { enabled: false } } },
      { TOOLSCOUT_MOCK_SOURCES: 'true' },
    );

    const sources = createSearchSources(config);

    expect(sources.primary).toBeUndefined();
    expect(sources.secondary?.name).toBe('mock-secondary');
  });

  it('should route requests through the injected fetch', async () => {
    const fetchFn = vi
      .fn<FetchFn>()
      .mockImplementation(() => Promise.resolve(new Response(JSON.stringify({ organic: [] }))));
    const sources = createSearchSources(resolveAppConfig({}, liveEnv), { fetchFn });

    await sources.secondary?.search('vault', 5);

    expect(fetchFn).toHaveBeenCalledWith('https://google.serper.dev/search', expect.anything());
  });

  it('should wrap sources with the cache when caching is enabled', async () => {
    const cache = createInMemorySearchCacheRepository();
    const config = resolveAppConfig(
      { cache: { enabled: true, ttlMs: 60000 } },
      { TOOLSCOUT_MOCK_SOURCES: 'true' },
    );

    const sources = createSearchSources(config, { cache });
    await sources.primary?.search('vault', 2);

    const cached = await cache.get('mock-primary|2|vault');
    expect(cached?.hits).toHaveLength(2);
  });
});

describe('resolveAttemptTimeoutMs', () => {
  it('should split the call budget across attempts by default', () => {
    const { primary, secondary } = resolveAppConfig({}, liveEnv).retrieval.sources;

    expect(resolveAttemptTimeoutMs(primary)).toBe(10_000);
    expect(resolveAttemptTimeoutMs(secondary)).toBe(10_000);
  });

  it('should honour an explicit attempt timeout up to the call budget', () => {
    const config = resolveAppConfig(
      {
        sources: {
          primary: { timeoutMs: 20_000, attemptTimeoutMs: 5_000 },
          secondary: { timeoutMs: 4_000, attemptTimeoutMs: 9_000 },
        },
      },
      liveEnv,
    );
    const { primary, secondary } = config.retrieval.sources;

    expect(resolveAttemptTimeoutMs(primary)).toBe(5_000);
    expect(resolveAttemptTimeoutMs(secondary)).toBe(4_000);
  });
});

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigurationError, toError } from '@toolscout/shared/src/utils/errors.js';
import { createChildLogger } from '@toolscout/shared/src/logger.js';
import { validateRetrievalConfig } from './validators.js';
import type { RetrievalConfig } from './retrieval-config.schema.js';

const log = createChildLogger('config:loader');

export const RETRIEVAL_CONFIG_FILE = 'retrieval.json';

export interface SourceCredentials {
  readonly firecrawlApiKey: string | null;
  readonly serperApiKey: string | null;
}

export interface AppConfig {
  readonly retrieval: RetrievalConfig;
  readonly credentials: SourceCredentials;
  /** Use in-process canned sources instead of the live search APIs. */
  readonly mockSources: boolean;
}

type Env = Readonly<Record<string, string | undefined>>;

async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as unknown;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(`Invalid JSON in ${filePath}: ${error.message}`);
    }
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }
    throw new ConfigurationError(
      `Failed to read configuration file ${filePath}: ${toError(error).message}`,
    );
  }
}

function readSecret(env: Env, key: string): string | null {
  const value = env[key]?.trim();
  return value ? value : null;
}

/**
 * Combines a raw retrieval config with credentials from the environment.
 *
 * The secondary source is switched off when its key is missing so retrieval
 * runs single-source; a missing primary key is a hard error. Mock mode needs
 * no keys at all.
 */
export function resolveAppConfig(raw: unknown, env: Env = process.env): AppConfig {
  let retrieval = validateRetrievalConfig(raw);
  const mockSources = env['TOOLSCOUT_MOCK_SOURCES'] === 'true';
  const credentials: SourceCredentials = Object.freeze({
    firecrawlApiKey: readSecret(env, 'FIRECRAWL_API_KEY'),
    serperApiKey: readSecret(env, 'SERPER_API_KEY'),
  });

  if (!mockSources) {
    if (retrieval.sources.primary.enabled && credentials.firecrawlApiKey === null) {
      throw new ConfigurationError(
        'FIRECRAWL_API_KEY is required while the primary source is enabled',
      );
    }

    if (retrieval.sources.secondary.enabled && credentials.serperApiKey === null) {
      log.warn('SERPER_API_KEY is not set, disabling the secondary source');
      retrieval = validateRetrievalConfig({
        ...retrieval,
        sources: {
          ...retrieval.sources,
          secondary: { ...retrieval.sources.secondary, enabled: false },
        },
      });
    }
  }

  return Object.freeze({ retrieval, credentials, mockSources });
}

export async function loadConfig(configDir: string, env: Env = process.env): Promise<AppConfig> {
  const configPath = join(configDir, RETRIEVAL_CONFIG_FILE);
  const raw = await readJsonFile(configPath);
  const config = resolveAppConfig(raw, env);

  log.info(
    {
      configPath,
      primaryEnabled: config.retrieval.sources.primary.enabled,
      secondaryEnabled: config.retrieval.sources.secondary.enabled,
      cache: config.retrieval.cache.enabled ? config.retrieval.cache.backend : 'off',
      mockSources: config.mockSources,
    },
    'Configuration loaded',
  );

  return config;
}

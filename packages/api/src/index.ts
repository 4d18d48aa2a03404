import { serve } from '@hono/node-server';
import { loadConfig } from '@toolscout/schemas/src/config-loader.js';
import { createConfiguredToolSearchService } from '@toolscout/core/src/services/retrieval/configured-tool-search.js';
import { createChildLogger } from '@toolscout/shared/src/logger.js';
import { createApp } from './app.js';

const log = createChildLogger('api:main');

async function main(): Promise<void> {
  const port = parseInt(process.env['PORT'] ?? '3000', 10);
  const configDir = process.env['TOOLSCOUT_CONFIG_DIR'] ?? 'config';

  const config = await loadConfig(configDir);
  const app = createApp({ searchService: createConfiguredToolSearchService(config) });

  log.info({ port }, 'Starting Toolscout API server');

  serve({ fetch: app.fetch, port }, (info) => {
    log.info({ port: info.port }, 'Toolscout API server running');
  });
}

main().catch((error: unknown) => {
  log.error(
    { error: error instanceof Error ? error.message : String(error) },
    'Failed to start API server',
  );
  process.exit(1);
});

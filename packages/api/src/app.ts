import type { OpenAPIHono } from '@hono/zod-openapi';
import { cors } from 'hono/cors';
import type { ToolSearchService } from '@toolscout/core/src/services/retrieval/types.js';
import { createChildLogger } from '@toolscout/shared/src/logger.js';
import { createRouter, type AppEnv } from './types.js';
import { requestId } from './middleware/request-id.js';
import { errorHandler } from './middleware/error-handler.js';
import { createHealthRoutes } from './routes/health.js';
import { createSearchRoutes } from './routes/search.js';

const log = createChildLogger('api:server');

export const API_VERSION = '0.1.0';

export interface AppDeps {
  readonly searchService: ToolSearchService;
}

export function createApp(deps: AppDeps): OpenAPIHono<AppEnv> {
  const app = createRouter();

  app.use('*', cors());
  app.use('*', requestId);

  // Request logging
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    log.info(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        duration,
        requestId: c.get('requestId'),
      },
      'Request completed',
    );
  });

  app.onError(errorHandler);

  app.route('/health', createHealthRoutes(API_VERSION));
  app.route('/search', createSearchRoutes(deps.searchService));

  app.get('/openapi.json', (c) => {
    return c.json(
      app.getOpenAPI31Document({
        openapi: '3.1.0',
        info: {
          title: 'Toolscout API',
          version: API_VERSION,
          description:
            'Classifies developer-tool queries and retrieves ranked results from several search sources',
        },
      }),
    );
  });

  return app;
}

import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import { createRouter, type AppEnv } from '../types.js';
import { HealthResponseSchema } from '../schemas/responses.js';

const healthRoute = createRoute({
  method: 'get',
  path: '/',
  tags: ['Health'],
  summary: 'Health check',
  responses: {
    200: {
      description: 'Service is up',
      content: {
        'application/json': {
          schema: HealthResponseSchema,
        },
      },
    },
  },
});

export function createHealthRoutes(version: string): OpenAPIHono<AppEnv> {
  const health = createRouter();

  health.openapi(healthRoute, (c) => {
    return c.json({ status: 'ok', version }, 200);
  });

  return health;
}

import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono, z } from '@hono/zod-openapi';
import type { QueryAnalysis } from '@toolscout/shared/src/types/query.types.js';
import type { RetrievalResult } from '@toolscout/shared/src/types/retrieval.types.js';
import type { ToolSearchService } from '@toolscout/core/src/services/retrieval/types.js';
import { createRouter, type AppEnv } from '../types.js';
import { AnalyzeRequestSchema, SearchRequestSchema } from '../schemas/requests.js';
import {
  ErrorResponseSchema,
  QueryAnalysisResponseSchema,
  RetrievalResponseSchema,
} from '../schemas/responses.js';

const errorResponses = {
  400: {
    description: 'Validation error',
    content: {
      'application/json': {
        schema: ErrorResponseSchema,
      },
    },
  },
} as const;

const analyzeRoute = createRoute({
  method: 'post',
  path: '/analyze',
  tags: ['Search'],
  summary: 'Classify a query and show the search strings it would produce',
  request: {
    body: {
      content: {
        'application/json': {
          schema: AnalyzeRequestSchema,
        },
      },
    },
  },
  responses: {
    200: {
      description: 'Query analysis',
      content: {
        'application/json': {
          schema: QueryAnalysisResponseSchema,
        },
      },
    },
    ...errorResponses,
  },
});

const retrieveRoute = createRoute({
  method: 'post',
  path: '/retrieve',
  tags: ['Search'],
  summary: 'Search the configured sources and return merged, ranked results',
  request: {
    body: {
      content: {
        'application/json': {
          schema: SearchRequestSchema,
        },
      },
    },
  },
  responses: {
    200: {
      description: 'Ranked results with per-source reports',
      content: {
        'application/json': {
          schema: RetrievalResponseSchema,
        },
      },
    },
    ...errorResponses,
  },
});

const articlesRoute = createRoute({
  method: 'post',
  path: '/articles',
  tags: ['Search'],
  summary: 'Search the primary source for review and comparison articles',
  request: {
    body: {
      content: {
        'application/json': {
          schema: SearchRequestSchema,
        },
      },
    },
  },
  responses: {
    200: {
      description: 'Ranked article results',
      content: {
        'application/json': {
          schema: RetrievalResponseSchema,
        },
      },
    },
    ...errorResponses,
  },
});

function toAnalysisResponse(analysis: QueryAnalysis): z.infer<typeof QueryAnalysisResponseSchema> {
  return {
    ...analysis,
    comparisonSubjects: analysis.comparisonSubjects ? [...analysis.comparisonSubjects] : null,
  };
}

function toRetrievalResponse(result: RetrievalResult): z.infer<typeof RetrievalResponseSchema> {
  return {
    query: result.query,
    documents: result.documents.map((doc) => ({ ...doc })),
    sources: result.sources.map((report) => ({ ...report })),
  };
}

export function createSearchRoutes(searchService: ToolSearchService): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(analyzeRoute, (c) => {
    const { query } = c.req.valid('json');
    return c.json(toAnalysisResponse(searchService.analyze(query)), 200);
  });

  routes.openapi(retrieveRoute, async (c) => {
    const { query, limit } = c.req.valid('json');
    const result = await searchService.retrieve(query, limit);
    return c.json(toRetrievalResponse(result), 200);
  });

  routes.openapi(articlesRoute, async (c) => {
    const { query, limit } = c.req.valid('json');
    const result = await searchService.searchArticles(query, limit);
    return c.json(toRetrievalResponse(result), 200);
  });

  return routes;
}

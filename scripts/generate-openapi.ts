import { createApp, API_VERSION } from '../packages/api/src/app.js';
import type { ToolSearchService } from '../packages/core/src/services/retrieval/types.js';

function unavailable(): never {
  throw new Error('Search service is not available while generating the OpenAPI document');
}

const searchService: ToolSearchService = {
  analyze: unavailable,
  retrieve: unavailable,
  searchAlternatives: unavailable,
  searchComparison: unavailable,
  searchArticles: unavailable,
};

const app = createApp({ searchService });

const doc = app.getOpenAPI31Document({
  openapi: '3.1.0',
  info: {
    title: 'Toolscout API',
    version: API_VERSION,
    description:
      'Classifies developer-tool queries and retrieves ranked results from several search sources',
  },
  servers: [{ url: 'http://localhost:3000', description: 'Local development' }],
});

process.stdout.write(JSON.stringify(doc, null, 2));
process.stdout.write('\n');

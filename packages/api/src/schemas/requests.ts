import { z } from '@hono/zod-openapi';

export const MAX_QUERY_LENGTH = 500;
export const MAX_RESULT_LIMIT = 50;

export const SearchRequestSchema = z
  .object({
    query: z
      .string()
      .min(1)
      .max(MAX_QUERY_LENGTH)
      .openapi({ example: 'mlflow alternatives' }),
    limit: z.number().int().min(1).max(MAX_RESULT_LIMIT).optional().openapi({ example: 5 }),
  })
  .openapi('SearchRequest');

export type SearchRequest = z.infer<typeof SearchRequestSchema>;

export const AnalyzeRequestSchema = z
  .object({
    query: z
      .string()
      .max(MAX_QUERY_LENGTH)
      .openapi({ example: 'datadog vs newrelic' }),
  })
  .openapi('AnalyzeRequest');

export type AnalyzeRequest = z.infer<typeof AnalyzeRequestSchema>;

import { z } from '@hono/zod-openapi';
import { QUERY_INTENTS, TOOL_DOMAINS } from '@toolscout/shared/src/types/query.types.js';

export const ErrorResponseSchema = z
  .object({
    error: z.string(),
    code: z.string(),
    requestId: z.string(),
    details: z.array(z.string()).optional(),
  })
  .openapi('ErrorResponse');

// Health
export const HealthResponseSchema = z
  .object({
    status: z.string(),
    version: z.string(),
  })
  .openapi('HealthResponse');

// Analysis
export const QueryAnalysisResponseSchema = z
  .object({
    originalQuery: z.string(),
    intent: z.enum(QUERY_INTENTS),
    domain: z.enum(TOOL_DOMAINS),
    targetSubject: z.string().nullable(),
    comparisonSubjects: z.array(z.string()).length(2).nullable(),
    searchQuery: z.string().nullable(),
    articleQuery: z.string().nullable(),
    isValid: z.boolean(),
  })
  .openapi('QueryAnalysisResponse');

// Retrieval
const SourceRoleSchema = z.enum(['primary', 'secondary']);

export const RankedDocumentSchema = z
  .object({
    title: z.string(),
    url: z.string(),
    body: z.string(),
    position: z.number().int(),
    source: SourceRoleSchema,
    provider: z.string(),
    score: z.number().min(0).max(1),
  })
  .openapi('RankedDocument');

export const SourceReportSchema = z
  .object({
    source: SourceRoleSchema,
    provider: z.string().nullable(),
    status: z.enum(['ok', 'failed', 'skipped', 'disabled']),
    hitCount: z.number().int(),
    error: z.string().optional(),
  })
  .openapi('SourceReport');

export const RetrievalResponseSchema = z
  .object({
    query: z.string(),
    documents: z.array(RankedDocumentSchema),
    sources: z.array(SourceReportSchema),
  })
  .openapi('RetrievalResponse');

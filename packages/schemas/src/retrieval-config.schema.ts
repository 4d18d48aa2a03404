import { z } from 'zod';

const SearchSettingsSchema = z
  .object({
    defaultLimit: z.number().int().min(1).max(50).default(5),
    secondaryMinHits: z.number().int().min(0).default(3),
  })
  .readonly();

function sourceSettingsSchema(defaults: { baseUrl: string; maxResults: number }) {
  return z
    .object({
      enabled: z.boolean().default(true),
      baseUrl: z.string().url().default(defaults.baseUrl),
      timeoutMs: z.number().int().positive().default(30_000),
      attemptTimeoutMs: z.number().int().positive().optional(),
      maxResults: z.number().int().min(1).max(100).default(defaults.maxResults),
      maxRetries: z.number().int().min(1).max(10).default(3),
      retryBaseDelayMs: z.number().int().min(0).default(1000),
    })
    .readonly();
}

// Serper caps a single request at 10 organic results on the free tier.
const PrimarySourceSchema = sourceSettingsSchema({
  baseUrl: 'https://api.firecrawl.dev',
  maxResults: 20,
});
const SecondarySourceSchema = sourceSettingsSchema({
  baseUrl: 'https://google.serper.dev',
  maxResults: 10,
});

const SourcesSchema = z
  .object({
    primary: PrimarySourceSchema.default({}),
    secondary: SecondarySourceSchema.default({}),
  })
  .readonly();

const CacheSettingsSchema = z
  .object({
    enabled: z.boolean().default(false),
    ttlMs: z.number().int().positive().default(60 * 60 * 1000),
    backend: z.enum(['memory', 'firestore']).default('memory'),
  })
  .readonly();

export const RetrievalConfigSchema = z
  .object({
    $schema: z.string().optional(),
    search: SearchSettingsSchema.default({}),
    sources: SourcesSchema.default({}),
    cache: CacheSettingsSchema.default({}),
  })
  .readonly();

export type RetrievalConfig = z.infer<typeof RetrievalConfigSchema>;
export type RetrievalConfigInput = z.input<typeof RetrievalConfigSchema>;
export type SearchSettings = z.infer<typeof SearchSettingsSchema>;
export type SourceSettings = z.infer<typeof PrimarySourceSchema>;
export type CacheSettings = z.infer<typeof CacheSettingsSchema>;

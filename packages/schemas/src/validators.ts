import type { ZodError } from 'zod';
import { SchemaValidationError } from '@toolscout/shared/src/utils/errors.js';
import { RetrievalConfigSchema } from './retrieval-config.schema.js';
import type { RetrievalConfig } from './retrieval-config.schema.js';
import { ClassificationRulesSchema } from './classification-rules.schema.js';
import type { ClassificationRules } from './classification-rules.schema.js';

export function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function validateRetrievalConfig(data: unknown): RetrievalConfig {
  const result = RetrievalConfigSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid retrieval configuration', formatZodErrors(result.error));
  }

  return result.data;
}

export function validateClassificationRules(data: unknown): ClassificationRules {
  const result = ClassificationRulesSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid classification rules', formatZodErrors(result.error));
  }

  return result.data;
}

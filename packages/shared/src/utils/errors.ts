export class ToolscoutError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'ToolscoutError';
  }
}

/**
 * Raised for raw query text that fails validation. Nothing is dispatched to a
 * search source once this has been thrown.
 */
export class QueryValidationError extends ToolscoutError {
  constructor(
    message: string,
    public readonly query: string,
  ) {
    super(message, 'QUERY_VALIDATION_ERROR');
    this.name = 'QueryValidationError';
  }
}

/**
 * A single search source failed. The retrieval orchestrator catches these and
 * records them per source; they never escape a retrieval call.
 */
export class SourceError extends ToolscoutError {
  constructor(
    message: string,
    public readonly source: string,
    public readonly retryable: boolean,
    cause?: Error,
  ) {
    super(message, 'SOURCE_ERROR', cause);
    this.name = 'SourceError';
  }
}

export class SchemaValidationError extends ToolscoutError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

export class ConfigurationError extends ToolscoutError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class PersistenceError extends ToolscoutError {
  constructor(message: string, cause?: Error) {
    super(message, 'PERSISTENCE_ERROR', cause);
    this.name = 'PersistenceError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

import { createChildLogger } from '@toolscout/shared/src/logger.js';
import { SourceError, toError } from '@toolscout/shared/src/utils/errors.js';
import type { FetchFn } from './types.js';

const log = createChildLogger('search-sources:http');

export interface JsonPostRequest {
  readonly source: string;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: unknown;
  readonly timeoutMs: number;
  readonly maxRetries: number;
  readonly retryBaseDelayMs: number;
  readonly signal?: AbortSignal;
  readonly fetchFn?: FetchFn;
}

const TRANSIENT_MESSAGE_PATTERNS = [
  'econnreset',
  'etimedout',
  'econnrefused',
  'socket hang up',
  'fetch failed',
  'timeout',
  'network',
];

export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export function isTransientError(error: unknown): boolean {
  if (error instanceof SourceError) {
    return error.retryable;
  }
  if (!(error instanceof Error)) {
    return false;
  }
  if (error.name === 'TimeoutError') {
    return true;
  }
  const message = error.message.toLowerCase();
  return TRANSIENT_MESSAGE_PATTERNS.some((pattern) => message.includes(pattern));
}

export function computeBackoffMs(attempt: number, baseDelayMs: number): number {
  const exponential = baseDelayMs * Math.pow(2, attempt);
  const jitter = Math.random() * baseDelayMs;
  return exponential + jitter;
}

/** Waits `ms`, or less when the signal aborts first. Never rejects. */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return;
  }
  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function abortedError(request: JsonPostRequest, cause?: Error): SourceError {
  return new SourceError(`${request.source} request aborted`, request.source, false, cause);
}

interface AttemptSignal {
  readonly signal: AbortSignal;
  readonly timedOut: () => boolean;
  dispose(): void;
}

// One controller per attempt, aborted by its own timer or by the caller.
function createAttemptSignal(timeoutMs: number, parent?: AbortSignal): AttemptSignal {
  const controller = new AbortController();
  let expired = false;
  const timer = setTimeout(() => {
    expired = true;
    controller.abort(new Error(`timeout after ${String(timeoutMs)}ms`));
  }, timeoutMs);
  const onParentAbort = (): void => controller.abort(parent?.reason);
  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose(): void {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

async function attemptPost(request: JsonPostRequest, fetchFn: FetchFn): Promise<unknown> {
  const attempt = createAttemptSignal(request.timeoutMs, request.signal);

  try {
    let response: Response;
    try {
      response = await fetchFn(request.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...request.headers },
        body: JSON.stringify(request.body),
        signal: attempt.signal,
      });
    } catch (error) {
      const cause = toError(error);
      if (attempt.timedOut()) {
        throw new SourceError(
          `${request.source} request timed out after ${String(request.timeoutMs)}ms`,
          request.source,
          true,
          cause,
        );
      }
      if (request.signal?.aborted) {
        throw abortedError(request, cause);
      }
      throw new SourceError(
        `${request.source} request failed: ${cause.message}`,
        request.source,
        isTransientError(cause),
        cause,
      );
    }

    if (!response.ok) {
      throw new SourceError(
        `${request.source} responded with HTTP ${String(response.status)}`,
        request.source,
        isTransientStatus(response.status),
      );
    }

    try {
      return (await response.json()) as unknown;
    } catch (error) {
      throw new SourceError(
        `${request.source} returned a body that is not JSON`,
        request.source,
        false,
        toError(error),
      );
    }
  } finally {
    attempt.dispose();
  }
}

/**
 * POSTs a JSON body and returns the parsed JSON response. Transient failures
 * (timeouts, resets, 408/429/5xx) are retried with exponential backoff; any
 * other failure is thrown at once as a non-retryable SourceError.
 */
export async function postJson(request: JsonPostRequest): Promise<unknown> {
  const fetchFn: FetchFn = request.fetchFn ?? ((input, init) => fetch(input, init));
  let lastError: SourceError | undefined;

  for (let attempt = 0; attempt < request.maxRetries; attempt++) {
    try {
      return await attemptPost(request, fetchFn);
    } catch (error) {
      const sourceError =
        error instanceof SourceError
          ? error
          : new SourceError(toError(error).message, request.source, false, toError(error));

      if (!sourceError.retryable || request.signal?.aborted) {
        throw sourceError;
      }
      lastError = sourceError;

      log.warn(
        {
          source: request.source,
          attempt: attempt + 1,
          maxRetries: request.maxRetries,
          error: sourceError.message,
        },
        'Transient source error, retrying',
      );

      if (attempt < request.maxRetries - 1) {
        await sleep(computeBackoffMs(attempt, request.retryBaseDelayMs), request.signal);
        if (request.signal?.aborted) {
          throw abortedError(request, sourceError);
        }
      }
    }
  }

  throw new SourceError(
    `${request.source} failed after ${String(request.maxRetries)} attempts: ${lastError?.message ?? 'unknown error'}`,
    request.source,
    true,
    lastError,
  );
}

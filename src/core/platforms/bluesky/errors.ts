// src/core/platforms/bluesky/errors.ts
import { RateLimitError, ScrubError, errorMessage } from '../../errors.js';
import { isObject } from '../../types/index.js';

// XRPC errors carry the HTTP status, the lexicon error name and the response headers
interface XrpcErrorShape {
  status?: number;
  error?: string;
  headers?: Record<string, unknown>;
}

function readXrpcError(error: unknown): XrpcErrorShape {
  if (!isObject(error)) {
    return {};
  }
  return {
    status: typeof error.status === 'number' ? error.status : undefined,
    error: typeof error.error === 'string' ? error.error : undefined,
    headers: isObject(error.headers) ? error.headers : undefined,
  };
}

/** `ratelimit-reset` is an epoch timestamp in seconds. */
export function retryAfterFromHeaders(
  headers: Record<string, unknown> | undefined,
  now: number = Date.now()
): number | undefined {
  const reset = headers?.['ratelimit-reset'];
  if (typeof reset === 'string' && /^\d+$/.test(reset)) {
    return Math.max(0, Number(reset) * 1000 - now);
  }
  return undefined;
}

export function isRecordNotFound(error: unknown): boolean {
  const { status, error: name } = readXrpcError(error);
  if (name === 'RecordNotFound') {
    return true;
  }
  return status === 400 && /could not locate record/i.test(errorMessage(error));
}

/**
 * Converts HTTP 429 responses into retryable {@link RateLimitError}s and
 * passes anything else through unchanged.
 */
export function toRateLimitError(error: unknown): unknown {
  if (error instanceof ScrubError) {
    return error;
  }
  const { status, headers } = readXrpcError(error);
  if (status === 429) {
    return new RateLimitError(`Bluesky rate limit hit: ${errorMessage(error)}`, retryAfterFromHeaders(headers));
  }
  return error;
}

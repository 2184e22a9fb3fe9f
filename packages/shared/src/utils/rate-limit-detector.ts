import { APICallError, RetryError } from 'ai';

import { RateLimitError } from './generation-errors';

/**
 * HTTP status used by providers to signal throttling
 */
const RATE_LIMIT_STATUS = 429;

/** Limit for following `cause` chains */
const MAX_CAUSE_DEPTH = 5;

/**
 * Detect whether an error thrown by a generation call is a rate-limit signal.
 *
 * Recognizes:
 * - RateLimitError thrown by custom generators
 * - AI SDK APICallError with HTTP 429
 * - AI SDK RetryError whose last error is one of the above
 * - Any of the above wrapped as an error `cause`
 */
export function detectRateLimit(error: unknown, depth = 0): boolean {
  if (depth > MAX_CAUSE_DEPTH || error === null || error === undefined) {
    return false;
  }

  if (error instanceof RateLimitError) return true;

  if (APICallError.isInstance(error)) {
    return error.statusCode === RATE_LIMIT_STATUS;
  }

  if (RetryError.isInstance(error)) {
    return detectRateLimit(error.lastError, depth + 1);
  }

  if (error instanceof Error) {
    return detectRateLimit(error.cause, depth + 1);
  }

  return false;
}

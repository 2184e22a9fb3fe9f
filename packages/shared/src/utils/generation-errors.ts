/**
 * GenerationTimeoutError
 *
 * Thrown when a generation call does not settle within its time budget.
 */
export class GenerationTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, options?: ErrorOptions) {
    super(`Generation call timed out after ${timeoutMs}ms`, options);
    this.name = 'GenerationTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * RateLimitError
 *
 * Explicit rate-limit signal for generators that do not speak HTTP
 * (local runtimes, fakes). HTTP 429 responses from the AI SDK are
 * recognized without it.
 */
export class RateLimitError extends Error {
  /**
   * Suggested wait before retrying, when the backend provides one
   */
  readonly retryAfterMs?: number;

  constructor(
    message = 'Rate limit exceeded',
    retryAfterMs?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'RateLimitError';
    this.retryAfterMs = retryAfterMs;
  }
}

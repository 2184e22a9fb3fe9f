import { APICallError, RetryError } from 'ai';
import { describe, expect, test } from 'vitest';

import { RateLimitError } from './generation-errors';
import { detectRateLimit } from './rate-limit-detector';

function apiError(statusCode: number): APICallError {
  return new APICallError({
    message: `HTTP ${statusCode}`,
    url: 'http://localhost:11434/api/generate',
    requestBodyValues: {},
    statusCode,
  });
}

describe('detectRateLimit', () => {
  test('recognizes RateLimitError', () => {
    expect(detectRateLimit(new RateLimitError())).toBe(true);
  });

  test('recognizes HTTP 429 from the AI SDK', () => {
    expect(detectRateLimit(apiError(429))).toBe(true);
  });

  test('ignores other HTTP failures', () => {
    expect(detectRateLimit(apiError(500))).toBe(false);
  });

  test('looks through RetryError to its last error', () => {
    const retryError = new RetryError({
      message: 'Failed after 3 attempts',
      reason: 'maxRetriesExceeded',
      errors: [apiError(500), apiError(429)],
    });

    expect(detectRateLimit(retryError)).toBe(true);
  });

  test('follows error causes', () => {
    const wrapped = new Error('generation failed', {
      cause: new RateLimitError('slow down'),
    });

    expect(detectRateLimit(wrapped)).toBe(true);
  });

  test('returns false for plain errors and non-errors', () => {
    expect(detectRateLimit(new Error('socket hang up'))).toBe(false);
    expect(detectRateLimit('429')).toBe(false);
    expect(detectRateLimit(undefined)).toBe(false);
  });
});

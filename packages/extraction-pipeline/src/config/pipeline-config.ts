import { z } from 'zod';

import {
  DEFAULT_ADJUST_EVERY,
  DEFAULT_GENERATION_TIMEOUT_MS,
  DEFAULT_INITIAL_CONCURRENCY,
  DEFAULT_LATENCY_LOWER_BOUND,
  DEFAULT_LATENCY_UPPER_BOUND,
  DEFAULT_LATENCY_WINDOW_SIZE,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_MAX_CHUNK_CHARS,
  DEFAULT_MAX_DOMAINS,
  DEFAULT_MAX_RATE_LIMIT_BACKOFF_MS,
  DEFAULT_MIN_CONCURRENCY,
  DEFAULT_MODEL,
  DEFAULT_NUM_WORKERS,
  DEFAULT_QUEUE_MAX_SIZE,
  DEFAULT_QUEUE_POLL_INTERVAL_MS,
  DEFAULT_RATE_LIMIT_BACKOFF_MS,
  DEFAULT_RATE_LIMIT_THRESHOLD,
  DEFAULT_RESULT_COLLECTION_TIMEOUT_MS,
  DEFAULT_VERBATIM_MAX_WORDS,
  DEFAULT_VERBATIM_MIN_WORDS,
} from './constants';

/**
 * ConfigValidationError
 *
 * Thrown when pipeline configuration values are out of range.
 */
export class ConfigValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid pipeline configuration: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

const positiveInt = z.number().int().positive();

export const pipelineConfigSchema = z
  .object({
    model: z.string().trim().min(1).default(DEFAULT_MODEL),
    numWorkers: positiveInt.default(DEFAULT_NUM_WORKERS),
    maxChunkChars: positiveInt.default(DEFAULT_MAX_CHUNK_CHARS),
    generationTimeoutMs: positiveInt.default(DEFAULT_GENERATION_TIMEOUT_MS),
    maxAttempts: positiveInt.default(DEFAULT_MAX_ATTEMPTS),
    rateLimitBackoffMs: z
      .number()
      .int()
      .nonnegative()
      .default(DEFAULT_RATE_LIMIT_BACKOFF_MS),
    maxRateLimitBackoffMs: z
      .number()
      .int()
      .nonnegative()
      .default(DEFAULT_MAX_RATE_LIMIT_BACKOFF_MS),
    initialConcurrency: positiveInt.optional(),
    minConcurrency: positiveInt.default(DEFAULT_MIN_CONCURRENCY),
    maxConcurrency: positiveInt.optional(),
    adjustEvery: positiveInt.default(DEFAULT_ADJUST_EVERY),
    rateLimitThreshold: positiveInt.default(DEFAULT_RATE_LIMIT_THRESHOLD),
    latencyWindowSize: positiveInt.default(DEFAULT_LATENCY_WINDOW_SIZE),
    latencyLowerBound: z.number().positive().default(DEFAULT_LATENCY_LOWER_BOUND),
    latencyUpperBound: z.number().positive().default(DEFAULT_LATENCY_UPPER_BOUND),
    queueMaxSize: positiveInt.default(DEFAULT_QUEUE_MAX_SIZE),
    queuePollIntervalMs: positiveInt.default(DEFAULT_QUEUE_POLL_INTERVAL_MS),
    resultCollectionTimeoutMs: positiveInt.default(
      DEFAULT_RESULT_COLLECTION_TIMEOUT_MS,
    ),
    verbatimMinWords: positiveInt.default(DEFAULT_VERBATIM_MIN_WORDS),
    verbatimMaxWords: positiveInt.default(DEFAULT_VERBATIM_MAX_WORDS),
    maxDomains: positiveInt.default(DEFAULT_MAX_DOMAINS),
  })
  .transform((config) => {
    const maxConcurrency = config.maxConcurrency ?? config.numWorkers;
    const initialConcurrency =
      config.initialConcurrency ??
      Math.max(
        config.minConcurrency,
        Math.min(DEFAULT_INITIAL_CONCURRENCY, maxConcurrency),
      );
    return { ...config, maxConcurrency, initialConcurrency };
  })
  .superRefine((config, ctx) => {
    if (config.minConcurrency > config.maxConcurrency) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['minConcurrency'],
        message: `must be <= maxConcurrency (${config.maxConcurrency})`,
      });
    }
    if (
      config.initialConcurrency < config.minConcurrency ||
      config.initialConcurrency > config.maxConcurrency
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['initialConcurrency'],
        message: `must be within [${config.minConcurrency}, ${config.maxConcurrency}]`,
      });
    }
    if (config.latencyLowerBound >= config.latencyUpperBound) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['latencyLowerBound'],
        message: 'must be < latencyUpperBound',
      });
    }
    if (config.verbatimMinWords > config.verbatimMaxWords) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['verbatimMinWords'],
        message: 'must be <= verbatimMaxWords',
      });
    }
  });

/**
 * Pipeline configuration as accepted from callers (every field optional)
 */
export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;

/**
 * Fully resolved pipeline configuration
 */
export type PipelineConfig = z.output<typeof pipelineConfigSchema>;

/**
 * Resolve caller-supplied configuration against the defaults.
 *
 * Concurrency bounds default to `[minConcurrency, numWorkers]`, and the
 * initial concurrency to `min(2, maxConcurrency)`.
 *
 * @throws ConfigValidationError when a value is out of range
 */
export function resolvePipelineConfig(
  input: PipelineConfigInput = {},
): PipelineConfig {
  const parsed = pipelineConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigValidationError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      ),
    );
  }
  return parsed.data;
}

const NUMERIC_ENV_KEYS = {
  CHAPTERWISE_NUM_WORKERS: 'numWorkers',
  CHAPTERWISE_MAX_CHUNK_CHARS: 'maxChunkChars',
  CHAPTERWISE_GENERATION_TIMEOUT_MS: 'generationTimeoutMs',
  CHAPTERWISE_MAX_ATTEMPTS: 'maxAttempts',
  CHAPTERWISE_INITIAL_CONCURRENCY: 'initialConcurrency',
  CHAPTERWISE_MIN_CONCURRENCY: 'minConcurrency',
  CHAPTERWISE_MAX_CONCURRENCY: 'maxConcurrency',
  CHAPTERWISE_QUEUE_MAX_SIZE: 'queueMaxSize',
} as const satisfies Record<string, keyof PipelineConfigInput>;

/**
 * Read configuration overrides from environment variables.
 *
 * Unset or blank variables are skipped. Non-numeric values are passed on as
 * NaN so that resolvePipelineConfig() reports them.
 *
 * @example
 * ```typescript
 * const config = resolvePipelineConfig({
 *   ...readPipelineEnv(process.env),
 *   numWorkers: 4,
 * });
 * ```
 */
export function readPipelineEnv(
  env: Record<string, string | undefined>,
): PipelineConfigInput {
  const input: PipelineConfigInput = {};

  const model = env.CHAPTERWISE_MODEL?.trim();
  if (model) {
    input.model = model;
  }

  for (const [envKey, configKey] of Object.entries(NUMERIC_ENV_KEYS)) {
    const raw = env[envKey]?.trim();
    if (raw) {
      input[configKey] = Number(raw);
    }
  }

  return input;
}

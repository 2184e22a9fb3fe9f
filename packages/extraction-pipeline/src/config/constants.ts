/**
 * Default model identifier passed to the text generator
 */
export const DEFAULT_MODEL = 'qwen2.5:7b';

/**
 * Number of chapter workers
 */
export const DEFAULT_NUM_WORKERS = 6;

/**
 * Maximum characters per chunk sent to the generator
 */
export const DEFAULT_MAX_CHUNK_CHARS = 8000;

/**
 * Time budget for one generation call (3 minutes)
 */
export const DEFAULT_GENERATION_TIMEOUT_MS = 180_000;

/**
 * Attempts per chunk: base prompt, then paraphrase prompt
 */
export const DEFAULT_MAX_ATTEMPTS = 2;

/**
 * Base delay before retrying after a rate-limit response; doubles per attempt
 */
export const DEFAULT_RATE_LIMIT_BACKOFF_MS = 2000;

/** Upper bound for the rate-limit backoff */
export const DEFAULT_MAX_RATE_LIMIT_BACKOFF_MS = 32_000;

// Adaptive rate controller
export const DEFAULT_INITIAL_CONCURRENCY = 2;
export const DEFAULT_MIN_CONCURRENCY = 1;
export const DEFAULT_ADJUST_EVERY = 5;
export const DEFAULT_RATE_LIMIT_THRESHOLD = 10;
export const DEFAULT_LATENCY_WINDOW_SIZE = 60;
export const DEFAULT_LATENCY_LOWER_BOUND = 0.5;
export const DEFAULT_LATENCY_UPPER_BOUND = 1.5;

/** Factor applied to concurrency after repeated rate limits */
export const RATE_LIMIT_BACKOFF_FACTOR = 0.7;

/** Factor applied to concurrency when latency is high */
export const HIGH_LATENCY_BACKOFF_FACTOR = 0.9;

/** Concurrency added when latency is low */
export const LOW_LATENCY_STEP = 2;

// Chapter queue
export const DEFAULT_QUEUE_MAX_SIZE = 500;
export const DEFAULT_QUEUE_POLL_INTERVAL_MS = 5000;

/**
 * Upper bound for waiting on chapter results (6 hours)
 */
export const DEFAULT_RESULT_COLLECTION_TIMEOUT_MS = 6 * 60 * 60 * 1000;

// Verbatim overlap detection
export const DEFAULT_VERBATIM_MIN_WORDS = 12;
export const DEFAULT_VERBATIM_MAX_WORDS = 20;

/**
 * Maximum number of domains kept per chunk
 */
export const DEFAULT_MAX_DOMAINS = 3;

/**
 * Domain used when neither the model nor keyword inference yields one
 */
export const FALLBACK_DOMAIN = 'strategy';

/**
 * Number of latency samples kept by the metrics collector
 */
export const METRICS_WINDOW_SIZE = 1000;

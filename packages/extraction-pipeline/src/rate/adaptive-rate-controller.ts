import type { LoggerMethods } from '@chapterwise/logger';

import { PermitGate, RingBuffer } from '@chapterwise/shared';
import { clamp, mean } from 'es-toolkit';

import {
  DEFAULT_ADJUST_EVERY,
  DEFAULT_LATENCY_LOWER_BOUND,
  DEFAULT_LATENCY_UPPER_BOUND,
  DEFAULT_LATENCY_WINDOW_SIZE,
  DEFAULT_RATE_LIMIT_THRESHOLD,
  HIGH_LATENCY_BACKOFF_FACTOR,
  LOW_LATENCY_STEP,
  RATE_LIMIT_BACKOFF_FACTOR,
} from '../config/constants';
import { BasePipelineComponent } from '../core/base-pipeline-component';

/**
 * Options for AdaptiveRateController
 */
export interface AdaptiveRateControllerOptions {
  /**
   * Concurrency at start (clamped into [minConcurrency, maxConcurrency])
   */
  initialConcurrency: number;

  /**
   * Lower concurrency bound
   */
  minConcurrency: number;

  /**
   * Upper concurrency bound
   */
  maxConcurrency: number;

  /**
   * Run adjust() after this many recorded calls (default: 5)
   */
  adjustEvery?: number;

  /**
   * Rate-limit hits that trigger a concurrency cut (default: 10)
   */
  rateLimitThreshold?: number;

  /**
   * Latency samples needed before latency drives adjustments (default: 60)
   */
  latencyWindowSize?: number;

  /**
   * Average latency in seconds below which concurrency grows (default: 0.5)
   */
  latencyLowerBound?: number;

  /**
   * Average latency in seconds above which concurrency shrinks (default: 1.5)
   */
  latencyUpperBound?: number;
}

/**
 * Snapshot of the controller state
 */
export interface RateControllerStatus {
  concurrency: number;
  minConcurrency: number;
  maxConcurrency: number;
  inFlight: number;
  waiting: number;
  rateLimitHits: number;
  latencySamples: number;
}

/**
 * AdaptiveRateController - Bounds in-flight generation calls and tunes the
 * bound from observed outcomes
 *
 * Adjustment rules, applied by adjust():
 * 1. Once `rateLimitThreshold` rate-limit hits have accumulated, concurrency
 *    drops to `floor(c * 0.7)` (never below the minimum). The hit counter and
 *    latency window are cleared and no latency rule runs.
 * 2. Otherwise, once the latency window is full, its average decides:
 *    below the lower bound adds 2, above the upper bound scales by 0.9.
 *    The window is cleared after it is evaluated.
 *
 * Shrinking never revokes permits already held; new permits wait until the
 * in-flight count is below the new bound.
 */
export class AdaptiveRateController extends BasePipelineComponent {
  private readonly gate: PermitGate;
  private readonly latencies: RingBuffer<number>;
  private readonly minConcurrency: number;
  private readonly maxConcurrency: number;
  private readonly adjustEvery: number;
  private readonly rateLimitThreshold: number;
  private readonly latencyLowerBound: number;
  private readonly latencyUpperBound: number;

  private concurrencyValue: number;
  private rateLimitHits = 0;
  private callsSinceAdjust = 0;

  constructor(logger: LoggerMethods, options: AdaptiveRateControllerOptions) {
    super(logger, 'AdaptiveRateController');

    if (options.minConcurrency < 1) {
      throw new RangeError(
        `minConcurrency must be >= 1, got ${options.minConcurrency}`,
      );
    }
    if (options.minConcurrency > options.maxConcurrency) {
      throw new RangeError(
        `minConcurrency (${options.minConcurrency}) exceeds maxConcurrency (${options.maxConcurrency})`,
      );
    }

    this.minConcurrency = options.minConcurrency;
    this.maxConcurrency = options.maxConcurrency;
    this.adjustEvery = options.adjustEvery ?? DEFAULT_ADJUST_EVERY;
    this.rateLimitThreshold =
      options.rateLimitThreshold ?? DEFAULT_RATE_LIMIT_THRESHOLD;
    this.latencyLowerBound =
      options.latencyLowerBound ?? DEFAULT_LATENCY_LOWER_BOUND;
    this.latencyUpperBound =
      options.latencyUpperBound ?? DEFAULT_LATENCY_UPPER_BOUND;
    this.latencies = new RingBuffer<number>(
      options.latencyWindowSize ?? DEFAULT_LATENCY_WINDOW_SIZE,
    );

    this.concurrencyValue = clamp(
      options.initialConcurrency,
      this.minConcurrency,
      this.maxConcurrency,
    );
    this.gate = new PermitGate(this.concurrencyValue);
  }

  get concurrency(): number {
    return this.concurrencyValue;
  }

  /**
   * Wait for a permit
   *
   * @throws the signal's reason when aborted while waiting
   */
  acquire(signal?: AbortSignal): Promise<void> {
    return this.gate.acquire(signal);
  }

  release(): void {
    this.gate.release();
  }

  /**
   * Release a held permit once `call` settles, whichever way it settles
   */
  releaseWhenSettled(call: Promise<unknown>): void {
    const release = (): void => this.release();
    void call.then(release, release);
  }

  /**
   * Record a successful call and its latency in seconds
   */
  recordSuccess(latencySeconds: number): void {
    this.latencies.push(latencySeconds);
    this.countCall();
  }

  recordRateLimit(): void {
    this.rateLimitHits++;
    this.countCall();
  }

  recordError(): void {
    this.countCall();
  }

  /**
   * Apply the adjustment rules once
   */
  adjust(): void {
    if (this.rateLimitHits >= this.rateLimitThreshold) {
      const next = Math.max(
        this.minConcurrency,
        Math.floor(this.concurrencyValue * RATE_LIMIT_BACKOFF_FACTOR),
      );
      this.log(
        'warn',
        `Rate limit detected (${this.rateLimitHits} hits). Reduced concurrency: ${this.concurrencyValue} -> ${next}`,
      );
      this.rateLimitHits = 0;
      this.latencies.clear();
      this.setConcurrency(next);
      return;
    }

    if (this.latencies.size < this.latencies.capacity) {
      return;
    }

    const average = mean(this.latencies.toArray());
    this.latencies.clear();

    if (average < this.latencyLowerBound) {
      const next = Math.min(
        this.maxConcurrency,
        this.concurrencyValue + LOW_LATENCY_STEP,
      );
      if (next !== this.concurrencyValue) {
        this.log(
          'info',
          `Low latency (${average.toFixed(3)}s). Increased concurrency: ${this.concurrencyValue} -> ${next}`,
        );
        this.setConcurrency(next);
      }
    } else if (average > this.latencyUpperBound) {
      const next = Math.max(
        this.minConcurrency,
        Math.floor(this.concurrencyValue * HIGH_LATENCY_BACKOFF_FACTOR),
      );
      if (next !== this.concurrencyValue) {
        this.log(
          'info',
          `High latency (${average.toFixed(3)}s). Reduced concurrency: ${this.concurrencyValue} -> ${next}`,
        );
        this.setConcurrency(next);
      }
    }
  }

  getStatus(): RateControllerStatus {
    return {
      concurrency: this.concurrencyValue,
      minConcurrency: this.minConcurrency,
      maxConcurrency: this.maxConcurrency,
      inFlight: this.gate.active,
      waiting: this.gate.pending,
      rateLimitHits: this.rateLimitHits,
      latencySamples: this.latencies.size,
    };
  }

  private countCall(): void {
    this.callsSinceAdjust++;
    if (this.callsSinceAdjust >= this.adjustEvery) {
      this.callsSinceAdjust = 0;
      this.adjust();
    }
  }

  private setConcurrency(next: number): void {
    this.concurrencyValue = next;
    this.gate.resize(next);
  }
}

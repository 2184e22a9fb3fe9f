import type { LoggerMethods } from '@chapterwise/logger';
import type { ExtractionResult } from '@chapterwise/model';
import type { TextGenerator } from '@chapterwise/shared';

import type { CheckpointStore } from '../checkpoint/checkpoint-store';
import type { PipelineMetrics } from '../metrics/pipeline-metrics';
import type { AdaptiveRateController } from '../rate/adaptive-rate-controller';
import type { ChunkProcessor, ChunkTask } from '../types';

import { callWithTimeout, detectRateLimit } from '@chapterwise/shared';
import { delay } from 'es-toolkit';

import { BasePipelineComponent } from '../core/base-pipeline-component';
import {
  type ChunkFailureReason,
  ChunkExtractionError,
  ExtractionError,
  StructuralValidationError,
} from '../errors/extraction-error';
import { DomainInferrer } from '../utils/domain-inferrer';
import { ExtractionResponseParser } from '../validators/extraction-response-parser';
import { VerbatimValidator } from '../validators/verbatim-validator';
import { type Attempt, ExtractionPrompts, planAttempt } from './extraction-prompts';

/**
 * Options for ChunkExtractor
 */
export interface ChunkExtractorOptions {
  /**
   * Model identifier passed to the generator
   */
  model: string;

  /**
   * Time budget per generation call
   */
  generationTimeoutMs: number;

  /**
   * Attempts per chunk
   */
  maxAttempts: number;

  /**
   * Base delay after a rate-limit failure; doubles per attempt
   */
  rateLimitBackoffMs: number;

  /**
   * Upper bound for the rate-limit delay
   */
  maxRateLimitBackoffMs: number;

  verbatimMinWords: number;
  verbatimMaxWords: number;

  /**
   * Maximum domains kept per chunk
   */
  maxDomains: number;

  /**
   * Domain vocabulary; when set, other domains are dropped
   */
  allowedDomains?: readonly string[];

  /**
   * Abort signal for cancellation support
   */
  abortSignal?: AbortSignal;

  /**
   * Millisecond clock used for latency measurement (default: performance.now)
   */
  clock?: () => number;
}

/**
 * ChunkExtractor - Extracts one chunk with retries
 *
 * Each attempt holds a rate-controller permit for as long as its generation
 * call runs, even past the timeout when the generator ignores the abort
 * signal. Structural failures and generation errors move on to the next
 * attempt; rate-limit failures are reported to the controller and followed
 * by an exponential delay. A verbatim overlap does not fail the attempt: the
 * result is kept with a `verbatimWarning`. Successful results are written to
 * the checkpoint store before they are returned.
 */
export class ChunkExtractor extends BasePipelineComponent implements ChunkProcessor {
  private readonly prompts: ExtractionPrompts;
  private readonly clock: () => number;

  constructor(
    logger: LoggerMethods,
    private readonly generator: TextGenerator,
    private readonly rateController: AdaptiveRateController,
    private readonly checkpointStore: CheckpointStore,
    private readonly metrics: PipelineMetrics,
    private readonly options: ChunkExtractorOptions,
  ) {
    super(logger, 'ChunkExtractor');
    this.prompts = new ExtractionPrompts(options.allowedDomains);
    this.clock = options.clock ?? (() => performance.now());
  }

  /**
   * @throws ChunkExtractionError after the last failed attempt
   */
  async extract(task: ChunkTask): Promise<ExtractionResult> {
    const { maxAttempts, abortSignal } = this.options;
    const label = `chapter ${task.chapterIndex} chunk ${task.chunkIndex}`;
    let lastError: unknown;
    let reason: ChunkFailureReason = 'generation';
    let attemptsMade = 0;

    for (let n = 1; n <= maxAttempts; n++) {
      if (abortSignal?.aborted) {
        reason = 'aborted';
        lastError = abortSignal.reason;
        break;
      }

      const attempt = planAttempt(n);
      attemptsMade = n;

      try {
        const result = await this.runAttempt(task, attempt, label);
        await this.saveCheckpoint(task, result, label);
        return result;
      } catch (error) {
        lastError = error;
        reason =
          error instanceof StructuralValidationError ? 'structural' : 'generation';
        this.log(
          'warn',
          `Attempt ${n}/${maxAttempts} failed for ${label} (${reason}): ${ExtractionError.getErrorMessage(error)}`,
        );

        if (n < maxAttempts && detectRateLimit(error)) {
          await this.backoff(n, label);
        }
      }
    }

    const failure = new ChunkExtractionError(
      {
        chapterIndex: task.chapterIndex,
        chunkIndex: task.chunkIndex,
        attempts: attemptsMade,
        reason,
      },
      { cause: lastError },
    );
    this.log('error', failure.message);
    throw failure;
  }

  private async runAttempt(
    task: ChunkTask,
    attempt: Attempt,
    label: string,
  ): Promise<ExtractionResult> {
    const { model, generationTimeoutMs, abortSignal } = this.options;
    const systemPrompt = this.prompts.buildSystemPrompt();
    const prompt = this.prompts.buildUserPrompt(
      task.text,
      task.chapterIndex,
      attempt,
    );

    await this.rateController.acquire(abortSignal);
    const inFlight: { call?: Promise<string> } = {};
    const startedAt = this.clock();
    let text: string;

    try {
      text = await callWithTimeout(
        (signal) => {
          inFlight.call = this.generator.generate({
            model,
            systemPrompt,
            prompt,
            timeoutMs: generationTimeoutMs,
            abortSignal: signal,
          });
          return inFlight.call;
        },
        generationTimeoutMs,
        abortSignal,
      );
    } catch (error) {
      this.metrics.recordError();
      if (detectRateLimit(error)) {
        this.rateController.recordRateLimit();
        this.metrics.recordRateLimit();
      } else {
        this.rateController.recordError();
      }
      throw error;
    } finally {
      // A timed-out call that ignores its signal keeps the permit until it settles
      if (inFlight.call) {
        this.rateController.releaseWhenSettled(inFlight.call);
      } else {
        this.rateController.release();
      }
    }

    const latencySeconds = (this.clock() - startedAt) / 1000;
    this.rateController.recordSuccess(latencySeconds);
    this.metrics.recordGeneration(latencySeconds);

    try {
      return this.validate(text, task, label);
    } catch (error) {
      this.metrics.recordError();
      throw error;
    }
  }

  private validate(
    text: string,
    task: ChunkTask,
    label: string,
  ): ExtractionResult {
    const { maxDomains, allowedDomains, verbatimMinWords, verbatimMaxWords } =
      this.options;
    const result = ExtractionResponseParser.parse(text, {
      maxDomains,
      allowedDomains,
    });

    if (result.domains.length === 0) {
      result.domains = DomainInferrer.infer(
        task.text,
        maxDomains,
        allowedDomains,
      );
      this.log(
        'warn',
        `No domains returned for ${label}; inferred ${result.domains.join(', ')}`,
      );
    }

    const verbatim = VerbatimValidator.check(result, task.text, {
      minWords: verbatimMinWords,
      maxWords: verbatimMaxWords,
    });
    if (verbatim.isVerbatim) {
      result.verbatimWarning = verbatim.message;
      this.log('warn', `Accepted ${label} with overlap: ${verbatim.message}`);
    }

    return result;
  }

  /**
   * A failed checkpoint write is logged; the extracted result is still used
   * and the chunk is extracted again on the next run
   */
  private async saveCheckpoint(
    task: ChunkTask,
    result: ExtractionResult,
    label: string,
  ): Promise<void> {
    try {
      await this.checkpointStore.markCompleted(
        task.chapterKey,
        task.chunkIndex,
        result,
      );
    } catch (error) {
      this.metrics.recordError();
      this.log(
        'error',
        `Failed to checkpoint ${label}: ${ExtractionError.getErrorMessage(error)}`,
      );
    }
  }

  private async backoff(attemptNumber: number, label: string): Promise<void> {
    const { rateLimitBackoffMs, maxRateLimitBackoffMs, abortSignal } =
      this.options;
    const waitMs = Math.min(
      rateLimitBackoffMs * 2 ** (attemptNumber - 1),
      maxRateLimitBackoffMs,
    );
    if (waitMs <= 0) {
      return;
    }

    this.log('info', `Rate limited on ${label}; waiting ${waitMs}ms`);
    try {
      await delay(waitMs, { signal: abortSignal });
    } catch (error) {
      // Aborted: the loop sees the signal and stops
      this.log('debug', `Backoff for ${label} interrupted`, error);
    }
  }
}

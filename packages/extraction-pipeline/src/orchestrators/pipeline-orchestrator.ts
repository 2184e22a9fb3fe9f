import type { LoggerMethods } from '@chapterwise/logger';
import type {
  Chapter,
  ChapterResult,
  PipelineProgressEvent,
} from '@chapterwise/model';

import type { PipelineMetrics } from '../metrics/pipeline-metrics';
import type { ChapterProcessor, PipelineRunResult } from '../types';

import { AsyncQueue } from '@chapterwise/shared';
import { delay } from 'es-toolkit';

import { BasePipelineComponent } from '../core/base-pipeline-component';
import {
  ExtractionError,
  PipelineFatalError,
} from '../errors/extraction-error';

export interface PipelineOrchestratorOptions {
  /**
   * Default number of chapter workers
   */
  numWorkers: number;

  /**
   * Capacity of the chapter queue
   */
  queueMaxSize: number;

  /**
   * How long a worker waits on the queue before rechecking the stop flag
   */
  queuePollIntervalMs: number;

  /**
   * Upper bound for waiting on all chapter results
   */
  resultCollectionTimeoutMs: number;

  /**
   * Aborting stops the run like stop()
   */
  abortSignal?: AbortSignal;

  /**
   * Called after every chapter
   */
  onProgress?: (event: PipelineProgressEvent) => void;

  /**
   * Millisecond clock used for chapter latency (default: performance.now)
   */
  clock?: () => number;
}

interface QueuedChapter {
  position: number;
  chapter: Chapter;
}

interface RunState {
  queue: AsyncQueue<QueuedChapter>;
  results: Map<number, ChapterResult>;
  totalChapters: number;
  completedChapters: number;
}

export const CANCELLED_REASON = 'cancelled';
export const TIMED_OUT_REASON = 'Timed out waiting for the chapter result';

/**
 * PipelineOrchestrator - Runs chapters on a pool of workers
 *
 * Chapters go through a bounded queue to `numWorkers` workers; each worker
 * processes one chapter at a time. Call-level concurrency is bounded
 * separately by the rate controller the chapter processor uses. Results are
 * returned in input order; a chapter without a result becomes a failed
 * result. When every chapter fails, the run throws PipelineFatalError unless
 * it was stopped.
 */
export class PipelineOrchestrator extends BasePipelineComponent {
  private readonly clock: () => number;
  private stopRequested = false;
  private activeQueue?: AsyncQueue<QueuedChapter>;

  constructor(
    logger: LoggerMethods,
    private readonly chapterProcessor: ChapterProcessor,
    private readonly metrics: PipelineMetrics,
    private readonly options: PipelineOrchestratorOptions,
  ) {
    super(logger, 'PipelineOrchestrator');
    this.clock = options.clock ?? (() => performance.now());
  }

  get isStopping(): boolean {
    return this.stopRequested;
  }

  /**
   * Stop handing out chapters. Chapters already being processed finish;
   * the rest come back failed with reason "cancelled".
   */
  stop(): void {
    if (this.stopRequested) {
      return;
    }
    this.stopRequested = true;
    this.log('info', 'Stop requested; no new chapters will be started');
    this.activeQueue?.close();
  }

  /**
   * @throws PipelineFatalError when every chapter failed
   */
  async run(
    chapters: readonly Chapter[],
    numWorkers: number = this.options.numWorkers,
  ): Promise<PipelineRunResult> {
    if (!Number.isInteger(numWorkers) || numWorkers < 1) {
      throw new RangeError(`numWorkers must be a positive integer, got ${numWorkers}`);
    }

    this.stopRequested = false;
    const { abortSignal } = this.options;
    const onAbort = (): void => this.stop();
    if (abortSignal?.aborted) {
      this.stop();
    }
    abortSignal?.addEventListener('abort', onAbort, { once: true });

    try {
      return await this.runChapters(chapters, numWorkers);
    } finally {
      abortSignal?.removeEventListener('abort', onAbort);
      this.activeQueue = undefined;
    }
  }

  private async runChapters(
    chapters: readonly Chapter[],
    numWorkers: number,
  ): Promise<PipelineRunResult> {
    const workerCount = Math.min(numWorkers, Math.max(1, chapters.length));
    const state: RunState = {
      queue: new AsyncQueue<QueuedChapter>(this.options.queueMaxSize),
      results: new Map(),
      totalChapters: chapters.length,
      completedChapters: 0,
    };
    this.activeQueue = state.queue;
    if (this.stopRequested) {
      state.queue.close();
    }

    this.log(
      'info',
      `Processing ${chapters.length} chapter(s) with ${workerCount} worker(s)`,
    );

    const work = Promise.all([
      this.produce(state, chapters),
      ...Array.from({ length: workerCount }, (_, id) => this.work(id, state)),
    ]);
    const finished = await this.waitAtMost(
      work,
      this.options.resultCollectionTimeoutMs,
    );
    if (!finished) {
      this.log(
        'error',
        `Result collection timed out after ${this.options.resultCollectionTimeoutMs}ms; missing chapters are marked failed`,
      );
      this.stopRequested = true;
      state.queue.close();
    }

    const missingReason = !finished
      ? TIMED_OUT_REASON
      : this.stopRequested
        ? CANCELLED_REASON
        : 'No result was produced for this chapter';
    const results = chapters.map((chapter, position) => {
      const result = state.results.get(position);
      if (result) {
        return result;
      }
      this.metrics.recordChapterStatus('failed');
      return this.failedResult(chapter, missingReason);
    });

    const report = this.metrics.report();
    this.metrics.logSummary(this.logger);

    const failedCount = results.filter((r) => r.status === 'failed').length;
    const cancelled = this.stopRequested && finished;
    if (results.length > 0 && failedCount === results.length && !cancelled) {
      this.log('error', `All ${results.length} chapter(s) failed`);
      throw new PipelineFatalError(results, report);
    }
    if (failedCount > 0) {
      this.log('warn', `${failedCount}/${results.length} chapter(s) failed`);
    }

    return { results, report };
  }

  private async produce(
    state: RunState,
    chapters: readonly Chapter[],
  ): Promise<void> {
    for (const [position, chapter] of chapters.entries()) {
      let accepted = false;
      while (!accepted && !this.stopRequested) {
        accepted = await state.queue.push(
          { position, chapter },
          this.options.queuePollIntervalMs,
        );
        if (!accepted && state.queue.isClosed) {
          return;
        }
      }
      if (!accepted) {
        return;
      }
    }
    state.queue.close();
  }

  private async work(workerId: number, state: RunState): Promise<void> {
    while (!this.stopRequested) {
      const next = await state.queue.pop(this.options.queuePollIntervalMs);
      if (next.status === 'timeout') {
        continue;
      }
      if (next.status === 'closed' || this.stopRequested) {
        return;
      }

      const { position, chapter } = next.item;
      const startedAt = this.clock();
      let result: ChapterResult;
      try {
        result = await this.chapterProcessor.process(chapter);
        this.metrics.recordChapter((this.clock() - startedAt) / 1000);
      } catch (error) {
        const reason = ExtractionError.getErrorMessage(error);
        this.log(
          'error',
          `Worker ${workerId} failed on chapter ${chapter.chapterIndex}: ${reason}`,
        );
        this.metrics.recordError();
        result = this.failedResult(chapter, reason);
      }

      state.results.set(position, result);
      this.metrics.recordChapterStatus(result.status);
      state.completedChapters++;
      this.notify(this.options.onProgress, {
        type: 'chapter',
        chapterIndex: chapter.chapterIndex,
        status: result.status,
        completedChapters: state.completedChapters,
        totalChapters: state.totalChapters,
      });
    }
  }

  /**
   * Resolve true when `work` settles within `timeoutMs`, false otherwise
   */
  private async waitAtMost(
    work: Promise<unknown>,
    timeoutMs: number,
  ): Promise<boolean> {
    const timer = new AbortController();
    try {
      return await Promise.race([
        work.then(() => true),
        delay(timeoutMs, { signal: timer.signal }).then(() => false),
      ]);
    } finally {
      timer.abort();
    }
  }

  private failedResult(chapter: Chapter, reason: string): ChapterResult {
    return {
      chapterIndex: chapter.chapterIndex,
      chapterId: chapter.chapterId,
      title: chapter.title,
      status: 'failed',
      domains: [],
      principles: [],
      rules: [],
      claims: [],
      warnings: [],
      totalChunks: 0,
      completedChunks: 0,
      resumedChunks: 0,
      failedChunks: [],
      verbatimWarnings: [],
      error: reason,
    };
  }
}

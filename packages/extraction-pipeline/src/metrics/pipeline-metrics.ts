import type { LoggerMethods } from '@chapterwise/logger';
import type { ChapterStatus, MetricsReport } from '@chapterwise/model';

import { RingBuffer } from '@chapterwise/shared';
import { mean } from 'es-toolkit';

import { METRICS_WINDOW_SIZE } from '../config/constants';

export interface PipelineMetricsOptions {
  /**
   * Millisecond clock (default: Date.now)
   */
  clock?: () => number;

  /**
   * Latency samples kept per series (default: 1000)
   */
  windowSize?: number;
}

function emptyChapterCounts(): Record<ChapterStatus, number> {
  return { ok: 0, valid_empty: 0, partial: 0, failed: 0 };
}

/**
 * PipelineMetrics - Counters and latency windows for one pipeline
 *
 * Counters are plain fields; the event loop serializes all updates. Latency
 * series keep the most recent samples only.
 *
 * @example
 * ```typescript
 * const metrics = new PipelineMetrics();
 * metrics.recordGeneration(0.42);
 * metrics.recordProcessed();
 * metrics.logSummary(logger);
 * // [ExtractionPipeline] Metrics summary:
 * //   Elapsed: 1.2s
 * //   Chunks: 1 processed, 0 resumed, 0 dropped
 * //   ...
 * ```
 */
export class PipelineMetrics {
  private readonly clock: () => number;
  private readonly generationLatencies: RingBuffer<number>;
  private readonly chapterLatencies: RingBuffer<number>;

  private startedAt: number;
  private processedChunks = 0;
  private resumedChunks = 0;
  private droppedChunks = 0;
  private errors = 0;
  private rateLimitHits = 0;
  private chapters = emptyChapterCounts();

  constructor(options: PipelineMetricsOptions = {}) {
    this.clock = options.clock ?? Date.now;
    const windowSize = options.windowSize ?? METRICS_WINDOW_SIZE;
    this.generationLatencies = new RingBuffer<number>(windowSize);
    this.chapterLatencies = new RingBuffer<number>(windowSize);
    this.startedAt = this.clock();
  }

  /**
   * Record one generation call latency in seconds
   */
  recordGeneration(latencySeconds: number): void {
    this.generationLatencies.push(latencySeconds);
  }

  /**
   * Record one chapter's wall-clock time in seconds
   */
  recordChapter(latencySeconds: number): void {
    this.chapterLatencies.push(latencySeconds);
  }

  recordProcessed(count = 1): void {
    this.processedChunks += count;
  }

  recordResumed(count = 1): void {
    this.resumedChunks += count;
  }

  recordDropped(count = 1): void {
    this.droppedChunks += count;
  }

  recordError(): void {
    this.errors++;
  }

  recordRateLimit(): void {
    this.rateLimitHits++;
  }

  recordChapterStatus(status: ChapterStatus): void {
    this.chapters[status]++;
  }

  /**
   * Seconds since construction or the last reset()
   */
  getElapsedSeconds(): number {
    return (this.clock() - this.startedAt) / 1000;
  }

  /**
   * Processed chunks per second; the elapsed time is floored at one second
   */
  getThroughput(): number {
    return this.processedChunks / Math.max(1, this.getElapsedSeconds());
  }

  report(): MetricsReport {
    return {
      elapsedSeconds: this.getElapsedSeconds(),
      processedChunks: this.processedChunks,
      resumedChunks: this.resumedChunks,
      droppedChunks: this.droppedChunks,
      errors: this.errors,
      rateLimitHits: this.rateLimitHits,
      chapters: { ...this.chapters },
      throughputChunksPerSec: this.getThroughput(),
      avgGenerationLatencyMs: averageMs(this.generationLatencies),
      avgChapterLatencyMs: averageMs(this.chapterLatencies),
    };
  }

  logSummary(logger: LoggerMethods): void {
    const report = this.report();
    const { chapters } = report;

    logger.info('[ExtractionPipeline] Metrics summary:');
    logger.info(`  Elapsed: ${report.elapsedSeconds.toFixed(1)}s`);
    logger.info(
      `  Chunks: ${report.processedChunks} processed, ${report.resumedChunks} resumed, ${report.droppedChunks} dropped`,
    );
    logger.info(
      `  Chapters: ${chapters.ok} ok, ${chapters.partial} partial, ${chapters.failed} failed, ${chapters.valid_empty} empty`,
    );
    logger.info(
      `  Errors: ${report.errors}, rate limit hits: ${report.rateLimitHits}`,
    );
    logger.info(
      `  Throughput: ${report.throughputChunksPerSec.toFixed(2)} chunks/s`,
    );
    logger.info(
      `  Avg latency: ${report.avgGenerationLatencyMs.toFixed(0)}ms per call, ${report.avgChapterLatencyMs.toFixed(0)}ms per chapter`,
    );
  }

  reset(): void {
    this.startedAt = this.clock();
    this.processedChunks = 0;
    this.resumedChunks = 0;
    this.droppedChunks = 0;
    this.errors = 0;
    this.rateLimitHits = 0;
    this.chapters = emptyChapterCounts();
    this.generationLatencies.clear();
    this.chapterLatencies.clear();
  }
}

function averageMs(samples: RingBuffer<number>): number {
  return samples.size === 0 ? 0 : mean(samples.toArray()) * 1000;
}

import type { ChapterStatus } from './chapter-result';

/**
 * Final metrics of a pipeline run
 *
 * Counters are monotonic for the lifetime of the collector; averages are
 * computed over the last samples only (bounded window).
 */
export interface MetricsReport {
  elapsedSeconds: number;

  /**
   * Chunks extracted by a generation call during this run
   */
  processedChunks: number;

  /**
   * Chunks reused from checkpoints
   */
  resumedChunks: number;

  /**
   * Chunks that failed terminally
   */
  droppedChunks: number;

  /**
   * Failed generation attempts (including retried ones)
   */
  errors: number;

  rateLimitHits: number;

  chapters: Record<ChapterStatus, number>;

  throughputChunksPerSec: number;
  avgGenerationLatencyMs: number;
  avgChapterLatencyMs: number;
}

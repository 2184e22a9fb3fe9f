import type { ChapterResult, MetricsReport } from '@chapterwise/model';

/**
 * ExtractionError
 *
 * Base error class for extraction failures.
 */
export class ExtractionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ExtractionError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create ExtractionError from unknown error with context
   */
  static fromError(context: string, error: unknown): ExtractionError {
    return new ExtractionError(
      `${context}: ${ExtractionError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * StructuralValidationError
 *
 * Thrown when a generator response is not a JSON object with the five
 * required list fields.
 */
export class StructuralValidationError extends ExtractionError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'StructuralValidationError';
    this.issues = issues;
  }
}

/**
 * Why a chunk gave up after its last attempt
 */
export type ChunkFailureReason = 'generation' | 'structural' | 'aborted';

/**
 * ChunkExtractionError
 *
 * Thrown when every attempt for a chunk has failed.
 */
export class ChunkExtractionError extends ExtractionError {
  readonly chapterIndex: number;
  readonly chunkIndex: number;
  readonly attempts: number;
  readonly reason: ChunkFailureReason;

  constructor(
    details: {
      chapterIndex: number;
      chunkIndex: number;
      attempts: number;
      reason: ChunkFailureReason;
    },
    options?: ErrorOptions,
  ) {
    const cause =
      options?.cause === undefined
        ? ''
        : `: ${ExtractionError.getErrorMessage(options.cause)}`;
    super(
      `Chunk ${details.chunkIndex} of chapter ${details.chapterIndex} failed after ${details.attempts} attempt(s) (${details.reason})${cause}`,
      options,
    );
    this.name = 'ChunkExtractionError';
    this.chapterIndex = details.chapterIndex;
    this.chunkIndex = details.chunkIndex;
    this.attempts = details.attempts;
    this.reason = details.reason;
  }
}

/**
 * PipelineFatalError
 *
 * Thrown when every chapter of a run failed. Carries the per-chapter
 * results and the metrics report so callers can still inspect them.
 */
export class PipelineFatalError extends ExtractionError {
  readonly results: ChapterResult[];
  readonly report: MetricsReport;

  constructor(results: ChapterResult[], report: MetricsReport) {
    super(`All ${results.length} chapter(s) failed`);
    this.name = 'PipelineFatalError';
    this.results = results;
    this.report = report;
  }

  /**
   * Get formatted error summary
   */
  getSummary(): string {
    const lines = [this.message, '', 'Chapters:'];

    for (const result of this.results) {
      lines.push(
        `  [${result.chapterIndex}] ${result.error ?? `${result.failedChunks.length} failed chunk(s)`}`,
      );
    }

    return lines.join('\n');
  }
}

import type { ExtractionItem } from './extraction-result';

/**
 * Chapter outcome
 *
 * - `ok`: at least one item was extracted
 * - `valid_empty`: every chunk succeeded but nothing actionable was found
 * - `partial`: some chunks failed terminally, others succeeded
 * - `failed`: every chunk failed terminally (or the chapter never ran)
 */
export type ChapterStatus = 'ok' | 'valid_empty' | 'partial' | 'failed';

/**
 * Chunk that exhausted its attempts
 */
export interface FailedChunk {
  chunkIndex: number;
  reason: string;
}

/**
 * Chunk accepted with a verbatim-overlap warning
 */
export interface VerbatimWarning {
  chunkIndex: number;
  message: string;
}

/**
 * Aggregate of all chunk results of one chapter
 *
 * Domains are the sorted union of chunk domains; item lists are concatenated
 * in chunk order and deduplicated.
 *
 * @interface ChapterResult
 */
export interface ChapterResult {
  chapterIndex: number;
  chapterId: string;
  title?: string;
  status: ChapterStatus;

  domains: string[];
  principles: ExtractionItem[];
  rules: ExtractionItem[];
  claims: ExtractionItem[];
  warnings: ExtractionItem[];

  /**
   * Number of chunks the chapter was split into
   * @type {number}
   */
  totalChunks: number;

  /**
   * Chunks with a result, including chunks reused from a checkpoint
   * @type {number}
   */
  completedChunks: number;

  /**
   * Chunks reused from a checkpoint without a generation call
   * @type {number}
   */
  resumedChunks: number;

  failedChunks: FailedChunk[];
  verbatimWarnings: VerbatimWarning[];

  /**
   * Chapter-level failure reason (crash, cancellation)
   * @type {string}
   */
  error?: string;
}

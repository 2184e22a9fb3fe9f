import type { ExtractionResult } from './extraction-result';

/**
 * Per-chapter checkpoint
 *
 * Records which chunks of a chapter already have an extraction result.
 * A chapter is complete when `completed` holds `totalChunks` entries.
 */
export interface CheckpointRecord {
  /**
   * Number of chunks the chapter was split into
   */
  totalChunks: number;

  /**
   * Completed chunk results keyed by chunk index
   */
  completed: Record<number, ExtractionResult>;
}

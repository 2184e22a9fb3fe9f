import type { CheckpointRecord, ExtractionResult } from '@chapterwise/model';

/**
 * Durable per-chapter record of completed chunks
 *
 * Keys are opaque strings, one per chapter (see chapterCheckpointKey()).
 * Implementations must keep concurrent markCompleted() calls for the same
 * key from losing updates, and a record must never be observable in a
 * partially written state.
 */
export interface CheckpointStore {
  /**
   * Load the record for `key`, or null when there is none
   */
  load(key: string): Promise<CheckpointRecord | null>;

  /**
   * Start or resume a record with `totalChunks` chunks.
   *
   * An existing record with the same chunk count is kept; one with a
   * different count is discarded, since its chunk indices no longer line up.
   */
  begin(key: string, totalChunks: number): Promise<CheckpointRecord>;

  /**
   * Durably record the result of one chunk
   */
  markCompleted(
    key: string,
    chunkIndex: number,
    result: ExtractionResult,
  ): Promise<void>;

  /**
   * True iff a record exists and every chunk is completed
   */
  isCompleted(key: string): Promise<boolean>;
}

export function chapterCheckpointKey(chapterId: string): string {
  return `chapter_${chapterId}`;
}

export function countCompleted(record: CheckpointRecord): number {
  return Object.keys(record.completed).length;
}

export function isRecordComplete(record: CheckpointRecord): boolean {
  return record.totalChunks > 0 && countCompleted(record) === record.totalChunks;
}

/**
 * Completed chunk results ordered by chunk index
 */
export function completedEntries(
  record: CheckpointRecord,
): Array<{ chunkIndex: number; result: ExtractionResult }> {
  return Object.entries(record.completed)
    .map(([index, result]) => ({ chunkIndex: Number(index), result }))
    .sort((a, b) => a.chunkIndex - b.chunkIndex);
}

/**
 * @throws RangeError when the index is outside the record
 */
export function assertChunkIndex(
  key: string,
  record: CheckpointRecord,
  chunkIndex: number,
): void {
  if (
    !Number.isInteger(chunkIndex) ||
    chunkIndex < 0 ||
    chunkIndex >= record.totalChunks
  ) {
    throw new RangeError(
      `Chunk index ${chunkIndex} is outside checkpoint ${key} (${record.totalChunks} chunks)`,
    );
  }
}

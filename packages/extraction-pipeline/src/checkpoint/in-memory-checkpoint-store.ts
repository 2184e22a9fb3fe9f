import type { CheckpointRecord, ExtractionResult } from '@chapterwise/model';

import {
  type CheckpointStore,
  assertChunkIndex,
  isRecordComplete,
} from './checkpoint-store';

/**
 * CheckpointStore kept in process memory
 *
 * Used when no checkpoint directory is configured, and in tests.
 * Records are copied on the way in and out.
 */
export class InMemoryCheckpointStore implements CheckpointStore {
  private readonly records = new Map<string, CheckpointRecord>();

  async load(key: string): Promise<CheckpointRecord | null> {
    const record = this.records.get(key);
    return record ? structuredClone(record) : null;
  }

  async begin(key: string, totalChunks: number): Promise<CheckpointRecord> {
    const existing = this.records.get(key);
    if (existing && existing.totalChunks === totalChunks) {
      return structuredClone(existing);
    }

    const record: CheckpointRecord = { totalChunks, completed: {} };
    this.records.set(key, record);
    return structuredClone(record);
  }

  async markCompleted(
    key: string,
    chunkIndex: number,
    result: ExtractionResult,
  ): Promise<void> {
    const record = this.records.get(key);
    if (!record) {
      throw new Error(`Checkpoint ${key} has not been started`);
    }
    assertChunkIndex(key, record, chunkIndex);
    record.completed[chunkIndex] = structuredClone(result);
  }

  async isCompleted(key: string): Promise<boolean> {
    const record = this.records.get(key);
    return record !== undefined && isRecordComplete(record);
  }
}

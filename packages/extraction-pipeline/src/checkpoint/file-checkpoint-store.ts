import type { LoggerMethods } from '@chapterwise/logger';
import type { CheckpointRecord, ExtractionResult } from '@chapterwise/model';

import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { BasePipelineComponent } from '../core/base-pipeline-component';
import { ExtractionError } from '../errors/extraction-error';
import {
  checkpointFileSchema,
  fromCheckpointFile,
  toCheckpointFile,
} from './checkpoint-file';
import {
  type CheckpointStore,
  assertChunkIndex,
  isRecordComplete,
} from './checkpoint-store';

/**
 * CheckpointStore writing one JSON file per key under a directory
 *
 * Each write goes to a temporary file in the same directory and is renamed
 * over the target, so readers see the old or the new record, never a torn
 * one. Writes for the same key run one after another in call order.
 * Unreadable or malformed files are logged and treated as absent.
 * Records are cached until they are complete and fully written; after that
 * the file is the only copy.
 */
export class FileCheckpointStore
  extends BasePipelineComponent
  implements CheckpointStore
{
  private readonly directory: string;
  private readonly records = new Map<string, CheckpointRecord>();
  private readonly writeQueues = new Map<string, Promise<void>>();

  constructor(logger: LoggerMethods, directory: string) {
    super(logger, 'FileCheckpointStore');
    this.directory = directory;
  }

  /**
   * Path of the file that holds `key`
   */
  filePathFor(key: string): string {
    return join(this.directory, `${key.replace(/[^\w.-]/g, '_')}.json`);
  }

  async load(key: string): Promise<CheckpointRecord | null> {
    const record = await this.lookup(key);
    return record ? structuredClone(record) : null;
  }

  async begin(key: string, totalChunks: number): Promise<CheckpointRecord> {
    const existing = await this.lookup(key);
    if (existing && existing.totalChunks === totalChunks) {
      return structuredClone(existing);
    }
    if (existing) {
      this.log(
        'warn',
        `Discarding checkpoint ${key}: chunk count changed ${existing.totalChunks} -> ${totalChunks}`,
      );
    }

    const record: CheckpointRecord = { totalChunks, completed: {} };
    this.records.set(key, record);
    await this.persist(key, record);
    return structuredClone(record);
  }

  async markCompleted(
    key: string,
    chunkIndex: number,
    result: ExtractionResult,
  ): Promise<void> {
    const record = await this.lookup(key);
    if (!record) {
      throw new ExtractionError(`Checkpoint ${key} has not been started`);
    }
    assertChunkIndex(key, record, chunkIndex);

    record.completed[chunkIndex] = structuredClone(result);
    await this.persist(key, record);

    if (
      isRecordComplete(record) &&
      this.records.get(key) === record &&
      !this.writeQueues.has(key)
    ) {
      this.records.delete(key);
    }
  }

  async isCompleted(key: string): Promise<boolean> {
    const record = await this.lookup(key);
    return record !== null && isRecordComplete(record);
  }

  private async lookup(key: string): Promise<CheckpointRecord | null> {
    const cached = this.records.get(key);
    if (cached) {
      return cached;
    }

    const record = await this.readRecord(key);
    // A concurrent caller may have cached the key while the file was read
    const raced = this.records.get(key);
    if (raced) {
      return raced;
    }
    if (record) {
      this.records.set(key, record);
    }
    return record;
  }

  private async readRecord(key: string): Promise<CheckpointRecord | null> {
    const filePath = this.filePathFor(key);

    let content: string;
    try {
      content = await readFile(filePath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      this.log('warn', `Failed to read checkpoint ${filePath}`, error);
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      this.log('warn', `Ignoring corrupt checkpoint ${filePath}`, error);
      return null;
    }

    const parsed = checkpointFileSchema.safeParse(json);
    if (!parsed.success) {
      this.log(
        'warn',
        `Ignoring malformed checkpoint ${filePath}: ${parsed.error.issues
          .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          .join('; ')}`,
      );
      return null;
    }

    return fromCheckpointFile(parsed.data);
  }

  /**
   * Snapshot the record now and queue its write behind earlier writes for
   * the same key
   */
  private persist(key: string, record: CheckpointRecord): Promise<void> {
    const content = `${JSON.stringify(toCheckpointFile(record), null, 2)}\n`;
    const previous = this.writeQueues.get(key) ?? Promise.resolve();

    // Earlier failures were already reported to their own callers
    const next = previous
      .catch(() => undefined)
      .then(() => this.writeAtomically(this.filePathFor(key), content));

    this.writeQueues.set(key, next);
    const settled = (): void => {
      if (this.writeQueues.get(key) === next) {
        this.writeQueues.delete(key);
      }
    };
    void next.then(settled, settled);
    return next;
  }

  private async writeAtomically(
    filePath: string,
    content: string,
  ): Promise<void> {
    const tempPath = `${filePath}.${randomUUID()}.tmp`;
    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(tempPath, content, 'utf8');
      await rename(tempPath, filePath);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw ExtractionError.fromError(
        `Failed to write checkpoint ${filePath}`,
        error,
      );
    }
  }
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

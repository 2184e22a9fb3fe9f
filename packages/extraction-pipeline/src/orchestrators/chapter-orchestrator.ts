import type { LoggerMethods } from '@chapterwise/logger';
import type {
  Chapter,
  ChapterResult,
  ExtractionResult,
  FailedChunk,
  PipelineProgressEvent,
} from '@chapterwise/model';

import type { CheckpointStore } from '../checkpoint/checkpoint-store';
import type { PipelineMetrics } from '../metrics/pipeline-metrics';
import type { ChapterProcessor, ChunkProcessor } from '../types';

import { ChapterAggregator } from '../aggregators/chapter-aggregator';
import {
  chapterCheckpointKey,
  completedEntries,
  isRecordComplete,
} from '../checkpoint/checkpoint-store';
import { BasePipelineComponent } from '../core/base-pipeline-component';
import { ExtractionError } from '../errors/extraction-error';
import { TextChunker } from '../utils/text-chunker';

export interface ChapterOrchestratorOptions {
  /**
   * Maximum characters per chunk
   */
  maxChunkChars: number;

  /**
   * Called after every chunk
   */
  onProgress?: (event: PipelineProgressEvent) => void;
}

/**
 * ChapterOrchestrator - Processes one chapter chunk by chunk
 *
 * A chapter whose checkpoint is complete is rebuilt from the checkpoint
 * without generation calls. Otherwise the chapter is chunked, chunks already
 * in the checkpoint are reused, and the rest are extracted one after another.
 * A chunk that fails terminally is recorded and does not stop the chapter.
 * Chapters sharing a checkpoint key (identical text) run one at a time, so a
 * duplicate is rebuilt from the first one's checkpoint.
 */
export class ChapterOrchestrator
  extends BasePipelineComponent
  implements ChapterProcessor
{
  private readonly running = new Map<string, Promise<ChapterResult>>();

  constructor(
    logger: LoggerMethods,
    private readonly extractor: ChunkProcessor,
    private readonly checkpointStore: CheckpointStore,
    private readonly metrics: PipelineMetrics,
    private readonly options: ChapterOrchestratorOptions,
  ) {
    super(logger, 'ChapterOrchestrator');
  }

  async process(chapter: Chapter): Promise<ChapterResult> {
    const key = chapterCheckpointKey(chapter.chapterId);
    const previous: Promise<unknown> =
      this.running.get(key) ?? Promise.resolve();
    const current = previous
      .catch(() => undefined)
      .then(() => this.processChapter(chapter, key));
    this.running.set(key, current);

    try {
      return await current;
    } finally {
      if (this.running.get(key) === current) {
        this.running.delete(key);
      }
    }
  }

  private async processChapter(
    chapter: Chapter,
    key: string,
  ): Promise<ChapterResult> {
    const existing = await this.checkpointStore.load(key);
    if (existing && isRecordComplete(existing)) {
      this.log(
        'info',
        `Chapter ${chapter.chapterIndex} already completed (${existing.totalChunks} chunks); rebuilding from checkpoint`,
      );
      this.metrics.recordResumed(existing.totalChunks);
      return ChapterAggregator.aggregate(chapter, {
        totalChunks: existing.totalChunks,
        completed: completedEntries(existing),
        failed: [],
        resumedChunks: existing.totalChunks,
      });
    }

    const chunks = TextChunker.split(chapter.rawText, this.options.maxChunkChars);
    if (chunks.length === 0) {
      this.log('warn', `Chapter ${chapter.chapterIndex} has no text`);
      return ChapterAggregator.aggregate(chapter, {
        totalChunks: 0,
        completed: [],
        failed: [],
        resumedChunks: 0,
      });
    }

    const record = await this.checkpointStore.begin(key, chunks.length);
    this.log(
      'info',
      `Chapter ${chapter.chapterIndex}: ${chunks.length} chunk(s), ${Object.keys(record.completed).length} already checkpointed`,
    );

    const completed: Array<{ chunkIndex: number; result: ExtractionResult }> = [];
    const failed: FailedChunk[] = [];
    let resumedChunks = 0;

    for (const [chunkIndex, text] of chunks.entries()) {
      const saved: ExtractionResult | undefined = record.completed[chunkIndex];
      if (saved) {
        completed.push({ chunkIndex, result: saved });
        resumedChunks++;
        this.metrics.recordResumed();
        continue;
      }

      try {
        const result = await this.extractor.extract({
          chapterKey: key,
          chapterIndex: chapter.chapterIndex,
          chunkIndex,
          text,
        });
        completed.push({ chunkIndex, result });
        this.metrics.recordProcessed();
        this.reportChunk(chapter, chunkIndex, chunks.length, true);
      } catch (error) {
        const reason = ExtractionError.getErrorMessage(error);
        failed.push({ chunkIndex, reason });
        this.metrics.recordDropped();
        this.log(
          'error',
          `Dropped chunk ${chunkIndex} of chapter ${chapter.chapterIndex}: ${reason}`,
        );
        this.reportChunk(chapter, chunkIndex, chunks.length, false);
      }
    }

    const result = ChapterAggregator.aggregate(chapter, {
      totalChunks: chunks.length,
      completed,
      failed,
      resumedChunks,
    });

    this.log(
      'info',
      `Chapter ${chapter.chapterIndex} ${result.status}: ${result.principles.length} principles, ${result.rules.length} rules, ${result.claims.length} claims, ${result.warnings.length} warnings`,
    );
    return result;
  }

  private reportChunk(
    chapter: Chapter,
    chunkIndex: number,
    totalChunks: number,
    succeeded: boolean,
  ): void {
    this.notify(this.options.onProgress, {
      type: 'chunk',
      chapterIndex: chapter.chapterIndex,
      chunkIndex,
      totalChunks,
      succeeded,
    });
  }
}

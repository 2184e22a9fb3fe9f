import type {
  Chapter,
  ChapterResult,
  ExtractionResult,
  MetricsReport,
} from '@chapterwise/model';

/**
 * One chunk of one chapter, ready for extraction
 */
export interface ChunkTask {
  /**
   * Checkpoint key of the owning chapter
   */
  chapterKey: string;

  /**
   * 1-based chapter index
   */
  chapterIndex: number;

  /**
   * 0-based chunk index within the chapter
   */
  chunkIndex: number;

  /**
   * Chunk text
   */
  text: string;
}

/**
 * Anything that turns a chunk into a checkpointed ExtractionResult
 */
export interface ChunkProcessor {
  extract(task: ChunkTask): Promise<ExtractionResult>;
}

/**
 * Anything that turns a chapter into a ChapterResult
 */
export interface ChapterProcessor {
  process(chapter: Chapter): Promise<ChapterResult>;
}

/**
 * Outcome of a pipeline run
 */
export interface PipelineRunResult {
  /**
   * One result per input chapter, in input order
   */
  results: ChapterResult[];

  /**
   * Metrics at the end of the run
   */
  report: MetricsReport;
}

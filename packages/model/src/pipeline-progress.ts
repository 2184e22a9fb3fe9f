import type { ChapterStatus } from './chapter-result';

/**
 * Emitted after every chunk resolves (success or terminal failure)
 */
export interface ChunkProgressEvent {
  type: 'chunk';
  chapterIndex: number;
  chunkIndex: number;
  totalChunks: number;
  succeeded: boolean;
}

/**
 * Emitted after every chapter result is final
 */
export interface ChapterProgressEvent {
  type: 'chapter';
  chapterIndex: number;
  status: ChapterStatus;
  completedChapters: number;
  totalChapters: number;
}

export type PipelineProgressEvent = ChunkProgressEvent | ChapterProgressEvent;

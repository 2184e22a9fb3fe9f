export type { Chapter, SourceDocument } from './document';
export {
  EXTRACTION_ITEM_KEYS,
  type ExtractionItem,
  type ExtractionItemKey,
  type ExtractionResult,
  type JsonValue,
} from './extraction-result';
export type { CheckpointRecord } from './checkpoint-record';
export type {
  ChapterResult,
  ChapterStatus,
  FailedChunk,
  VerbatimWarning,
} from './chapter-result';
export type { MetricsReport } from './metrics-report';
export type {
  ChapterProgressEvent,
  ChunkProgressEvent,
  PipelineProgressEvent,
} from './pipeline-progress';

/**
 * @chapterwise/extraction-pipeline
 *
 * Resumable, concurrency-bounded extraction of principles, rules, claims and
 * warnings from book chapters.
 *
 * ## Key Features
 *
 * - Chapter-level worker pool over a bounded queue
 * - Adaptive call concurrency driven by rate limits and latency
 * - Per-chunk checkpoints; completed chapters are never re-extracted
 * - Structural validation and verbatim-overlap detection
 * - Run metrics with throughput and latency averages
 *
 * @packageDocumentation
 */

export { ExtractionPipeline } from './extraction-pipeline';
export type { ExtractionPipelineOptions } from './extraction-pipeline';
export type {
  ChapterProcessor,
  ChunkProcessor,
  ChunkTask,
  PipelineRunResult,
} from './types';
export { BasePipelineComponent } from './core';
export {
  ConfigValidationError,
  readPipelineEnv,
  resolvePipelineConfig,
} from './config/pipeline-config';
export type {
  PipelineConfig,
  PipelineConfigInput,
} from './config/pipeline-config';
export {
  ChunkExtractionError,
  ExtractionError,
  PipelineFatalError,
  StructuralValidationError,
} from './errors/extraction-error';
export type { ChunkFailureReason } from './errors/extraction-error';
export { AdaptiveRateController } from './rate/adaptive-rate-controller';
export type {
  AdaptiveRateControllerOptions,
  RateControllerStatus,
} from './rate/adaptive-rate-controller';
export {
  chapterCheckpointKey,
  FileCheckpointStore,
  InMemoryCheckpointStore,
  isRecordComplete,
} from './checkpoint';
export type { CheckpointStore } from './checkpoint';
export { ChunkExtractor, ExtractionPrompts, planAttempt } from './extractors';
export type { Attempt, ChunkExtractorOptions, PromptStrategy } from './extractors';
export { ChapterAggregator } from './aggregators/chapter-aggregator';
export type { ChunkOutcomes } from './aggregators/chapter-aggregator';
export {
  CANCELLED_REASON,
  ChapterOrchestrator,
  PipelineOrchestrator,
  TIMED_OUT_REASON,
} from './orchestrators';
export type {
  ChapterOrchestratorOptions,
  PipelineOrchestratorOptions,
} from './orchestrators';
export { PipelineMetrics } from './metrics/pipeline-metrics';
export type { PipelineMetricsOptions } from './metrics/pipeline-metrics';
export { ChapterSplitter, PAGE_SEPARATOR } from './splitters/chapter-splitter';
export { ExtractionResponseParser, VerbatimValidator } from './validators';
export type {
  ResponseParseOptions,
  VerbatimCheckOptions,
  VerbatimCheckResult,
} from './validators';
export {
  contentHash,
  DomainInferrer,
  ItemDeduplicator,
  TextChunker,
  TextNormalizer,
} from './utils';

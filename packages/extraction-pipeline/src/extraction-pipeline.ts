import type { LoggerMethods } from '@chapterwise/logger';
import type {
  Chapter,
  MetricsReport,
  PipelineProgressEvent,
  SourceDocument,
} from '@chapterwise/model';
import type { TextGenerator } from '@chapterwise/shared';

import type { CheckpointStore } from './checkpoint/checkpoint-store';
import type { RateControllerStatus } from './rate/adaptive-rate-controller';
import type { PipelineRunResult } from './types';

import { FileCheckpointStore } from './checkpoint/file-checkpoint-store';
import { InMemoryCheckpointStore } from './checkpoint/in-memory-checkpoint-store';
import {
  ConfigValidationError,
  type PipelineConfig,
  type PipelineConfigInput,
  resolvePipelineConfig,
} from './config/pipeline-config';
import { ChunkExtractor } from './extractors/chunk-extractor';
import { PipelineMetrics } from './metrics/pipeline-metrics';
import { ChapterOrchestrator } from './orchestrators/chapter-orchestrator';
import { PipelineOrchestrator } from './orchestrators/pipeline-orchestrator';
import { AdaptiveRateController } from './rate/adaptive-rate-controller';
import { ChapterSplitter } from './splitters/chapter-splitter';

/**
 * ExtractionPipeline Options
 *
 * Every PipelineConfig field may also be given here; see
 * resolvePipelineConfig() for defaults.
 */
export interface ExtractionPipelineOptions extends PipelineConfigInput {
  /**
   * Logger instance
   */
  logger: LoggerMethods;

  /**
   * Text-generation capability (e.g. AiTextGenerator)
   */
  generator: TextGenerator;

  /**
   * Checkpoint store. Takes precedence over checkpointDir.
   */
  checkpointStore?: CheckpointStore;

  /**
   * Directory for file checkpoints. Without it (and without
   * checkpointStore) checkpoints live in memory and a rerun starts over.
   */
  checkpointDir?: string;

  /**
   * Domain vocabulary offered to the model; other domains are dropped and
   * inferred domains are drawn from it. Must not be empty.
   */
  allowedDomains?: readonly string[];

  /**
   * Abort signal for cancellation support.
   * When aborted, no new chapters start and pending generation calls are
   * cancelled.
   */
  abortSignal?: AbortSignal;

  /**
   * Callback fired after every chunk and every chapter
   */
  onProgress?: (event: PipelineProgressEvent) => void;

  /**
   * Millisecond clock for metrics (default: Date.now)
   */
  clock?: () => number;
}

/**
 * ExtractionPipeline
 *
 * Wires the rate controller, checkpoint store, chunk extractor and the
 * chapter and pipeline orchestrators into one object. One controller is
 * shared by every worker, so the number of concurrent generation calls is
 * bounded independently of the worker count.
 *
 * @example
 * ```typescript
 * import { getLogger } from '@chapterwise/logger';
 * import { AiTextGenerator } from '@chapterwise/shared';
 * import { ExtractionPipeline, readPipelineEnv } from '@chapterwise/extraction-pipeline';
 *
 * const pipeline = new ExtractionPipeline({
 *   ...readPipelineEnv(process.env),
 *   logger: getLogger(),
 *   generator: new AiTextGenerator(),
 *   checkpointDir: './checkpoints',
 * });
 *
 * const { results, report } = await pipeline.runDocument({
 *   title: 'Field Manual',
 *   pages,
 * });
 * ```
 */
export class ExtractionPipeline {
  readonly config: PipelineConfig;
  private readonly logger: LoggerMethods;
  private readonly metrics: PipelineMetrics;
  private readonly rateController: AdaptiveRateController;
  private readonly checkpointStore: CheckpointStore;
  private readonly orchestrator: PipelineOrchestrator;

  constructor(options: ExtractionPipelineOptions) {
    const {
      logger,
      generator,
      checkpointStore,
      checkpointDir,
      allowedDomains,
      abortSignal,
      onProgress,
      clock,
      ...configInput
    } = options;

    if (allowedDomains?.length === 0) {
      throw new ConfigValidationError([
        'allowedDomains: must list at least one domain',
      ]);
    }

    this.config = resolvePipelineConfig(configInput);
    this.logger = logger;
    this.metrics = new PipelineMetrics({ clock });
    this.rateController = new AdaptiveRateController(logger, this.config);
    this.checkpointStore =
      checkpointStore ??
      (checkpointDir
        ? new FileCheckpointStore(logger, checkpointDir)
        : new InMemoryCheckpointStore());

    const extractor = new ChunkExtractor(
      logger,
      generator,
      this.rateController,
      this.checkpointStore,
      this.metrics,
      { ...this.config, allowedDomains, abortSignal },
    );
    const chapterOrchestrator = new ChapterOrchestrator(
      logger,
      extractor,
      this.checkpointStore,
      this.metrics,
      { maxChunkChars: this.config.maxChunkChars, onProgress },
    );
    this.orchestrator = new PipelineOrchestrator(
      logger,
      chapterOrchestrator,
      this.metrics,
      { ...this.config, abortSignal, onProgress },
    );
  }

  /**
   * Process chapters and return one result per chapter, in input order.
   *
   * @param numWorkers - Worker count for this run (default: config.numWorkers)
   * @throws PipelineFatalError when every chapter failed
   */
  run(chapters: readonly Chapter[], numWorkers?: number): Promise<PipelineRunResult> {
    return this.orchestrator.run(chapters, numWorkers);
  }

  /**
   * Split a document into chapters by headings, then run them
   */
  runDocument(
    document: SourceDocument,
    numWorkers?: number,
  ): Promise<PipelineRunResult> {
    const chapters = ChapterSplitter.fromDocument(document);
    this.logger.info(
      `[ExtractionPipeline] Split document into ${chapters.length} chapter(s)`,
    );
    return this.run(chapters, numWorkers);
  }

  /**
   * Stop starting new chapters; see PipelineOrchestrator.stop()
   */
  stop(): void {
    this.orchestrator.stop();
  }

  getMetricsReport(): MetricsReport {
    return this.metrics.report();
  }

  getRateControllerStatus(): RateControllerStatus {
    return this.rateController.getStatus();
  }
}

import type { LoggerMethods } from '@chapterwise/logger';
import type { Chapter, ExtractionResult } from '@chapterwise/model';

import type { ChunkTask } from '../types';

import { type Mock, beforeEach, describe, expect, test, vi } from 'vitest';

import { chapterCheckpointKey } from '../checkpoint/checkpoint-store';
import { InMemoryCheckpointStore } from '../checkpoint/in-memory-checkpoint-store';
import { PipelineMetrics } from '../metrics/pipeline-metrics';
import { contentHash } from '../utils/content-hash';
import { ChapterOrchestrator } from './chapter-orchestrator';

function chapterOf(rawText: string, chapterIndex = 1): Chapter {
  return { chapterIndex, chapterId: contentHash(rawText), rawText };
}

// Three paragraphs of 10 characters; with maxChunkChars 12 each is one chunk
const THREE_CHUNKS = 'para-one..\n\npara-two..\n\npara-three';

function resultFor(task: ChunkTask): ExtractionResult {
  return {
    domains: ['strategy'],
    principles: [`principle ${task.chunkIndex}`],
    rules: ['shared rule'],
    claims: [],
    warnings: [],
  };
}

describe('ChapterOrchestrator', () => {
  let mockLogger: LoggerMethods;
  let store: InMemoryCheckpointStore;
  let metrics: PipelineMetrics;
  let extract: Mock<(task: ChunkTask) => Promise<ExtractionResult>>;
  let onProgress: Mock;

  function createOrchestrator(): ChapterOrchestrator {
    return new ChapterOrchestrator(mockLogger, { extract }, store, metrics, {
      maxChunkChars: 12,
      onProgress,
    });
  }

  beforeEach(() => {
    mockLogger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    store = new InMemoryCheckpointStore();
    metrics = new PipelineMetrics();
    onProgress = vi.fn();
    extract = vi.fn(async (task: ChunkTask) => {
      const result = resultFor(task);
      await store.markCompleted(task.chapterKey, task.chunkIndex, result);
      return result;
    });
  });

  test('extracts every chunk and aggregates the results', async () => {
    const chapter = chapterOf(THREE_CHUNKS);

    const result = await createOrchestrator().process(chapter);

    expect(extract).toHaveBeenCalledTimes(3);
    expect(extract.mock.calls.map(([task]) => task.text)).toEqual([
      'para-one..',
      '\n\npara-two..',
      '\n\npara-three',
    ]);
    expect(result.status).toBe('ok');
    expect(result.totalChunks).toBe(3);
    expect(result.completedChunks).toBe(3);
    expect(result.principles).toEqual([
      'principle 0',
      'principle 1',
      'principle 2',
    ]);
    expect(result.rules).toEqual(['shared rule']);
    expect(metrics.report().processedChunks).toBe(3);
  });

  test('passes the checkpoint key and chapter index to the extractor', async () => {
    const chapter = chapterOf('short text', 5);

    await createOrchestrator().process(chapter);

    expect(extract).toHaveBeenCalledWith({
      chapterKey: chapterCheckpointKey(chapter.chapterId),
      chapterIndex: 5,
      chunkIndex: 0,
      text: 'short text',
    });
  });

  test('a second run is rebuilt from the checkpoint without extraction', async () => {
    const chapter = chapterOf(THREE_CHUNKS);
    const orchestrator = createOrchestrator();
    const first = await orchestrator.process(chapter);
    extract.mockClear();

    const second = await orchestrator.process(chapter);

    expect(extract).not.toHaveBeenCalled();
    expect(second).toEqual({ ...first, resumedChunks: 3 });
    expect(metrics.report().resumedChunks).toBe(3);
  });

  test('resumes a partially checkpointed chapter', async () => {
    const chapter = chapterOf(THREE_CHUNKS);
    const key = chapterCheckpointKey(chapter.chapterId);
    await store.begin(key, 3);
    await store.markCompleted(key, 1, {
      domains: ['timing'],
      principles: ['saved earlier'],
      rules: [],
      claims: [],
      warnings: [],
    });

    const result = await createOrchestrator().process(chapter);

    expect(extract.mock.calls.map(([task]) => task.chunkIndex)).toEqual([0, 2]);
    expect(result.resumedChunks).toBe(1);
    expect(result.principles).toEqual([
      'principle 0',
      'saved earlier',
      'principle 2',
    ]);
    expect(result.domains).toEqual(['strategy', 'timing']);
  });

  test('a failing chunk makes the chapter partial', async () => {
    extract.mockImplementationOnce(async () => {
      throw new Error('generator down');
    });

    const result = await createOrchestrator().process(chapterOf(THREE_CHUNKS));

    expect(result.status).toBe('partial');
    expect(result.failedChunks).toEqual([
      { chunkIndex: 0, reason: 'generator down' },
    ]);
    expect(result.completedChunks).toBe(2);
    expect(metrics.report().droppedChunks).toBe(1);
    expect(mockLogger.error).toHaveBeenCalledWith(
      '[ChapterOrchestrator] Dropped chunk 0 of chapter 1: generator down',
    );
  });

  test('every chunk failing makes the chapter failed', async () => {
    extract.mockRejectedValue(new Error('generator down'));

    const result = await createOrchestrator().process(chapterOf(THREE_CHUNKS));

    expect(result.status).toBe('failed');
    expect(result.failedChunks).toHaveLength(3);
    expect(await store.isCompleted(chapterCheckpointKey(contentHash(THREE_CHUNKS)))).toBe(false);
  });

  test('an empty chapter is valid_empty with no chunks', async () => {
    const result = await createOrchestrator().process(chapterOf('  \n\n  '));

    expect(extract).not.toHaveBeenCalled();
    expect(result.status).toBe('valid_empty');
    expect(result.totalChunks).toBe(0);
  });

  test('reports progress per chunk', async () => {
    extract.mockImplementationOnce(async () => {
      throw new Error('boom');
    });

    await createOrchestrator().process(chapterOf(THREE_CHUNKS, 2));

    expect(onProgress.mock.calls.map(([event]) => event)).toEqual([
      { type: 'chunk', chapterIndex: 2, chunkIndex: 0, totalChunks: 3, succeeded: false },
      { type: 'chunk', chapterIndex: 2, chunkIndex: 1, totalChunks: 3, succeeded: true },
      { type: 'chunk', chapterIndex: 2, chunkIndex: 2, totalChunks: 3, succeeded: true },
    ]);
  });

  test('chapters with identical text are extracted once', async () => {
    const orchestrator = createOrchestrator();

    const [first, second] = await Promise.all([
      orchestrator.process(chapterOf(THREE_CHUNKS, 1)),
      orchestrator.process(chapterOf(THREE_CHUNKS, 2)),
    ]);

    expect(extract).toHaveBeenCalledTimes(3);
    expect(first.resumedChunks).toBe(0);
    expect(second.chapterIndex).toBe(2);
    expect(second.resumedChunks).toBe(3);
    expect(second.principles).toEqual(first.principles);
  });
});

import type { LoggerMethods } from '@chapterwise/logger';
import type { ExtractionResult } from '@chapterwise/model';

import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { FileCheckpointStore } from './file-checkpoint-store';

const result: ExtractionResult = {
  domains: ['timing'],
  principles: ['Act when the moment is ripe'],
  rules: [{ text: 'Wait for the tide', source: 'p. 3' }],
  claims: [],
  warnings: [],
  verbatimWarning: "Verbatim phrase detected: 'x...'",
};

describe('FileCheckpointStore', () => {
  let mockLogger: LoggerMethods;
  let dir: string;

  beforeEach(async () => {
    mockLogger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    dir = await mkdtemp(join(tmpdir(), 'chapterwise-file-store-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('writes one snake_case JSON file per key', async () => {
    const store = new FileCheckpointStore(mockLogger, dir);
    await store.begin('chapter_abc', 2);
    await store.markCompleted('chapter_abc', 1, result);

    const content = JSON.parse(
      await readFile(join(dir, 'chapter_abc.json'), 'utf8'),
    );

    expect(content).toEqual({
      total_chunks: 2,
      completed: {
        '1': {
          domains: ['timing'],
          principles: ['Act when the moment is ripe'],
          rules: [{ text: 'Wait for the tide', source: 'p. 3' }],
          claims: [],
          warnings: [],
          verbatim_warning: "Verbatim phrase detected: 'x...'",
        },
      },
    });
  });

  test('leaves no temporary files behind', async () => {
    const store = new FileCheckpointStore(mockLogger, dir);
    await store.begin('chapter_abc', 3);
    await Promise.all([
      store.markCompleted('chapter_abc', 0, result),
      store.markCompleted('chapter_abc', 1, result),
      store.markCompleted('chapter_abc', 2, result),
    ]);

    expect(await readdir(dir)).toEqual(['chapter_abc.json']);
  });

  test('a new instance resumes from disk', async () => {
    const first = new FileCheckpointStore(mockLogger, dir);
    await first.begin('chapter_abc', 2);
    await first.markCompleted('chapter_abc', 0, result);
    await first.markCompleted('chapter_abc', 1, result);

    const second = new FileCheckpointStore(mockLogger, dir);

    expect(await second.isCompleted('chapter_abc')).toBe(true);
    expect(await second.load('chapter_abc')).toEqual({
      totalChunks: 2,
      completed: { 0: result, 1: result },
    });
  });

  test('reads a completed record back from its file', async () => {
    const store = new FileCheckpointStore(mockLogger, dir);
    await store.begin('chapter_abc', 1);
    await store.markCompleted('chapter_abc', 0, result);
    expect(await store.isCompleted('chapter_abc')).toBe(true);

    await writeFile(
      join(dir, 'chapter_abc.json'),
      JSON.stringify({ total_chunks: 2, completed: {} }),
    );

    expect(await store.load('chapter_abc')).toEqual({
      totalChunks: 2,
      completed: {},
    });
  });

  test('keeps an unfinished record in memory', async () => {
    const store = new FileCheckpointStore(mockLogger, dir);
    await store.begin('chapter_abc', 2);
    await store.markCompleted('chapter_abc', 0, result);

    await rm(join(dir, 'chapter_abc.json'));

    expect(await store.load('chapter_abc')).toEqual({
      totalChunks: 2,
      completed: { 0: result },
    });
  });

  test('treats a corrupt file as absent and warns', async () => {
    await writeFile(join(dir, 'chapter_bad.json'), '{"total_chunks": 2,');
    const store = new FileCheckpointStore(mockLogger, dir);

    expect(await store.load('chapter_bad')).toBeNull();
    expect(mockLogger.warn).toHaveBeenCalledWith(
      `[FileCheckpointStore] Ignoring corrupt checkpoint ${join(dir, 'chapter_bad.json')}`,
      expect.any(SyntaxError),
    );
  });

  test('treats a malformed record as absent', async () => {
    await writeFile(
      join(dir, 'chapter_bad.json'),
      JSON.stringify({ total_chunks: 1, completed: { '3': {} } }),
    );
    const store = new FileCheckpointStore(mockLogger, dir);

    expect(await store.load('chapter_bad')).toBeNull();
    expect(mockLogger.warn).toHaveBeenCalledTimes(1);
  });

  test('overwrites a corrupt file on begin', async () => {
    await writeFile(join(dir, 'chapter_bad.json'), 'not json');
    const store = new FileCheckpointStore(mockLogger, dir);

    await store.begin('chapter_bad', 1);

    const content = JSON.parse(
      await readFile(join(dir, 'chapter_bad.json'), 'utf8'),
    );
    expect(content).toEqual({ total_chunks: 1, completed: {} });
  });

  test('warns when discarding a record with a different chunk count', async () => {
    const store = new FileCheckpointStore(mockLogger, dir);
    await store.begin('chapter_abc', 2);

    await store.begin('chapter_abc', 4);

    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[FileCheckpointStore] Discarding checkpoint chapter_abc: chunk count changed 2 -> 4',
    );
  });

  test('creates the directory on first write', async () => {
    const nested = join(dir, 'nested', 'checkpoints');
    const store = new FileCheckpointStore(mockLogger, nested);

    await store.begin('chapter_abc', 1);

    expect(await readdir(nested)).toEqual(['chapter_abc.json']);
  });

  test('sanitizes keys into file names', () => {
    const store = new FileCheckpointStore(mockLogger, dir);

    expect(store.filePathFor('chapter_a/b c')).toBe(
      join(dir, 'chapter_a_b_c.json'),
    );
  });
});

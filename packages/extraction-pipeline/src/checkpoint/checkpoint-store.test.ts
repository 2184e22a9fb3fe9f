import type { LoggerMethods } from '@chapterwise/logger';
import type { ExtractionResult } from '@chapterwise/model';

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import {
  type CheckpointStore,
  chapterCheckpointKey,
  completedEntries,
  isRecordComplete,
} from './checkpoint-store';
import { FileCheckpointStore } from './file-checkpoint-store';
import { InMemoryCheckpointStore } from './in-memory-checkpoint-store';

function chunkResult(label: string): ExtractionResult {
  return {
    domains: ['strategy'],
    principles: [label],
    rules: [],
    claims: [],
    warnings: [],
  };
}

const mockLogger: LoggerMethods = {
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

describe('checkpoint helpers', () => {
  test('chapterCheckpointKey prefixes the chapter id', () => {
    expect(chapterCheckpointKey('abc123')).toBe('chapter_abc123');
  });

  test('isRecordComplete requires every chunk', () => {
    expect(isRecordComplete({ totalChunks: 2, completed: {} })).toBe(false);
    expect(
      isRecordComplete({ totalChunks: 1, completed: { 0: chunkResult('a') } }),
    ).toBe(true);
    expect(isRecordComplete({ totalChunks: 0, completed: {} })).toBe(false);
  });

  test('completedEntries orders by chunk index', () => {
    const entries = completedEntries({
      totalChunks: 11,
      completed: { 10: chunkResult('k'), 2: chunkResult('c') },
    });

    expect(entries.map((entry) => entry.chunkIndex)).toEqual([2, 10]);
  });
});

const tempDirs: string[] = [];

const stores: Array<[string, () => Promise<CheckpointStore>]> = [
  ['InMemoryCheckpointStore', async () => new InMemoryCheckpointStore()],
  [
    'FileCheckpointStore',
    async () => {
      const dir = await mkdtemp(join(tmpdir(), 'chapterwise-checkpoint-'));
      tempDirs.push(dir);
      return new FileCheckpointStore(mockLogger, dir);
    },
  ],
];

afterEach(async () => {
  await Promise.all(
    tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })),
  );
});

describe.each(stores)('%s contract', (_name, createStore) => {
  let store: CheckpointStore;

  beforeEach(async () => {
    store = await createStore();
  });

  test('load returns null for an unknown key', async () => {
    expect(await store.load('chapter_missing')).toBeNull();
  });

  test('begin creates an empty record', async () => {
    expect(await store.begin('chapter_a', 3)).toEqual({
      totalChunks: 3,
      completed: {},
    });
    expect(await store.isCompleted('chapter_a')).toBe(false);
  });

  test('markCompleted records results until the chapter is complete', async () => {
    await store.begin('chapter_a', 2);
    await store.markCompleted('chapter_a', 1, chunkResult('second'));
    expect(await store.isCompleted('chapter_a')).toBe(false);

    await store.markCompleted('chapter_a', 0, chunkResult('first'));

    expect(await store.isCompleted('chapter_a')).toBe(true);
    expect(await store.load('chapter_a')).toEqual({
      totalChunks: 2,
      completed: { 0: chunkResult('first'), 1: chunkResult('second') },
    });
  });

  test('begin keeps a record with the same chunk count', async () => {
    await store.begin('chapter_a', 2);
    await store.markCompleted('chapter_a', 0, chunkResult('first'));

    const resumed = await store.begin('chapter_a', 2);

    expect(resumed.completed).toEqual({ 0: chunkResult('first') });
  });

  test('begin discards a record with a different chunk count', async () => {
    await store.begin('chapter_a', 2);
    await store.markCompleted('chapter_a', 0, chunkResult('first'));

    const restarted = await store.begin('chapter_a', 3);

    expect(restarted).toEqual({ totalChunks: 3, completed: {} });
  });

  test('markCompleted rejects an unknown key', async () => {
    await expect(
      store.markCompleted('chapter_none', 0, chunkResult('x')),
    ).rejects.toThrow('Checkpoint chapter_none has not been started');
  });

  test('markCompleted rejects an out-of-range index', async () => {
    await store.begin('chapter_a', 1);

    await expect(
      store.markCompleted('chapter_a', 1, chunkResult('x')),
    ).rejects.toThrow(RangeError);
  });

  test('concurrent markCompleted calls lose no updates', async () => {
    await store.begin('chapter_a', 20);

    await Promise.all(
      Array.from({ length: 20 }, (_, i) =>
        store.markCompleted('chapter_a', i, chunkResult(`chunk ${i}`)),
      ),
    );

    expect(await store.isCompleted('chapter_a')).toBe(true);
  });

  test('loaded records are copies', async () => {
    await store.begin('chapter_a', 1);
    const loaded = await store.load('chapter_a');
    if (loaded) {
      loaded.completed[0] = chunkResult('tampered');
    }

    expect(await store.isCompleted('chapter_a')).toBe(false);
  });

  test('keys are independent', async () => {
    await store.begin('chapter_a', 1);
    await store.begin('chapter_b', 1);
    await store.markCompleted('chapter_a', 0, chunkResult('a'));

    expect(await store.isCompleted('chapter_a')).toBe(true);
    expect(await store.isCompleted('chapter_b')).toBe(false);
  });
});

import { describe, expect, test } from 'vitest';

import {
  ConfigValidationError,
  readPipelineEnv,
  resolvePipelineConfig,
} from './pipeline-config';

describe('resolvePipelineConfig', () => {
  test('applies defaults', () => {
    const config = resolvePipelineConfig();

    expect(config.model).toBe('qwen2.5:7b');
    expect(config.numWorkers).toBe(6);
    expect(config.maxChunkChars).toBe(8000);
    expect(config.generationTimeoutMs).toBe(180_000);
    expect(config.maxAttempts).toBe(2);
    expect(config.minConcurrency).toBe(1);
    expect(config.maxConcurrency).toBe(6);
    expect(config.initialConcurrency).toBe(2);
    expect(config.adjustEvery).toBe(5);
    expect(config.rateLimitThreshold).toBe(10);
    expect(config.latencyWindowSize).toBe(60);
    expect(config.queueMaxSize).toBe(500);
    expect(config.queuePollIntervalMs).toBe(5000);
    expect(config.verbatimMinWords).toBe(12);
    expect(config.verbatimMaxWords).toBe(20);
  });

  test('derives concurrency bounds from numWorkers', () => {
    const config = resolvePipelineConfig({ numWorkers: 1 });

    expect(config.maxConcurrency).toBe(1);
    expect(config.initialConcurrency).toBe(1);
  });

  test('keeps explicit concurrency values', () => {
    const config = resolvePipelineConfig({
      numWorkers: 4,
      minConcurrency: 2,
      maxConcurrency: 10,
      initialConcurrency: 5,
    });

    expect(config.minConcurrency).toBe(2);
    expect(config.maxConcurrency).toBe(10);
    expect(config.initialConcurrency).toBe(5);
  });

  test('rejects non-positive worker counts', () => {
    expect(() => resolvePipelineConfig({ numWorkers: 0 })).toThrow(
      ConfigValidationError,
    );
  });

  test('rejects inverted concurrency bounds', () => {
    try {
      resolvePipelineConfig({ minConcurrency: 5, maxConcurrency: 2 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.issues).toContain(
          'minConcurrency: must be <= maxConcurrency (2)',
        );
      }
    }
  });

  test('rejects inverted latency bounds', () => {
    expect(() =>
      resolvePipelineConfig({ latencyLowerBound: 2, latencyUpperBound: 1 }),
    ).toThrow('latencyLowerBound: must be < latencyUpperBound');
  });

  test('rejects inverted verbatim window', () => {
    expect(() =>
      resolvePipelineConfig({ verbatimMinWords: 25, verbatimMaxWords: 20 }),
    ).toThrow('verbatimMinWords: must be <= verbatimMaxWords');
  });
});

describe('readPipelineEnv', () => {
  test('reads model and numeric overrides', () => {
    const input = readPipelineEnv({
      CHAPTERWISE_MODEL: ' local-model ',
      CHAPTERWISE_NUM_WORKERS: '3',
      CHAPTERWISE_MAX_CHUNK_CHARS: '4000',
    });

    expect(input).toEqual({
      model: 'local-model',
      numWorkers: 3,
      maxChunkChars: 4000,
    });
  });

  test('skips blank and unset variables', () => {
    expect(
      readPipelineEnv({ CHAPTERWISE_MODEL: '  ', CHAPTERWISE_NUM_WORKERS: '' }),
    ).toEqual({});
  });

  test('invalid numbers fail resolution', () => {
    const input = readPipelineEnv({ CHAPTERWISE_NUM_WORKERS: 'many' });

    expect(() => resolvePipelineConfig(input)).toThrow(ConfigValidationError);
  });
});

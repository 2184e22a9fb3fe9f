import type { LoggerMethods } from './index';

import { describe, expect, test, vi } from 'vitest';

import { Logger, getLogger, isLogLevel } from './index';

function createSink(): LoggerMethods {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

describe('Logger', () => {
  test('exposes the methods it was constructed with', () => {
    const sink = createSink();
    const logger = new Logger(sink);

    logger.warn('careful', 1);

    expect(sink.warn).toHaveBeenCalledWith('careful', 1);
  });
});

describe('getLogger', () => {
  test('defaults to info level', () => {
    const sink = createSink();
    const logger = getLogger({ sink });

    logger.debug('hidden');
    logger.info('shown');

    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.info).toHaveBeenCalledWith('shown');
  });

  test('forwards every level when set to debug', () => {
    const sink = createSink();
    const logger = getLogger({ level: 'debug', sink });

    logger.debug('a');
    logger.info('b');
    logger.warn('c');
    logger.error('d');

    expect(sink.debug).toHaveBeenCalledWith('a');
    expect(sink.info).toHaveBeenCalledWith('b');
    expect(sink.warn).toHaveBeenCalledWith('c');
    expect(sink.error).toHaveBeenCalledWith('d');
  });

  test('drops everything when silent', () => {
    const sink = createSink();
    const logger = getLogger({ level: 'silent', sink });

    logger.error('nothing');

    expect(sink.error).not.toHaveBeenCalled();
  });

  test('only errors pass at error level', () => {
    const sink = createSink();
    const logger = getLogger({ level: 'error', sink });

    logger.warn('dropped');
    logger.error('kept');

    expect(sink.warn).not.toHaveBeenCalled();
    expect(sink.error).toHaveBeenCalledWith('kept');
  });
});

describe('isLogLevel', () => {
  test('recognizes supported levels', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});

type LogFn = (...args: unknown[]) => void;

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

class Logger implements LoggerMethods {
  public readonly debug: LogFn;
  public readonly info: LogFn;
  public readonly warn: LogFn;
  public readonly error: LogFn;

  constructor(methods: LoggerMethods) {
    this.debug = methods.debug;
    this.info = methods.info;
    this.warn = methods.warn;
    this.error = methods.error;
  }
}

interface GetLoggerOptions {
  /**
   * Minimum level that reaches the sink (default: 'info')
   */
  level?: LogLevel;

  /**
   * Destination for log calls (default: console)
   */
  sink?: LoggerMethods;
}

const noop: LogFn = () => {};

/**
 * Create a Logger that forwards to `sink` and drops calls below `level`.
 *
 * @example
 * ```typescript
 * const logger = getLogger({ level: 'debug' });
 * logger.info('[ExtractionPipeline] Starting run');
 * ```
 */
function getLogger(options: GetLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const sink: LoggerMethods = options.sink ?? {
    debug: (...args) => console.debug(...args),
    info: (...args) => console.info(...args),
    warn: (...args) => console.warn(...args),
    error: (...args) => console.error(...args),
  };

  const pick = (level: Exclude<LogLevel, 'silent'>): LogFn =>
    LEVEL_ORDER[level] >= threshold ? sink[level] : noop;

  return new Logger({
    debug: pick('debug'),
    info: pick('info'),
    warn: pick('warn'),
    error: pick('error'),
  });
}

/**
 * Check whether a string names a supported log level.
 */
function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export { Logger, getLogger, isLogLevel };
export type { GetLoggerOptions, LoggerMethods, LogFn, LogLevel };

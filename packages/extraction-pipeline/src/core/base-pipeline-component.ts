import type { LoggerMethods } from '@chapterwise/logger';

/**
 * Abstract base class for pipeline components
 *
 * Provides consistent logging with a component name prefix, and a guard
 * for caller-supplied callbacks.
 */
export abstract class BasePipelineComponent {
  protected readonly logger: LoggerMethods;
  protected readonly componentName: string;

  /**
   * @param logger - Logger instance for logging
   * @param componentName - Name of the component for logging (e.g., "ChunkExtractor")
   */
  constructor(logger: LoggerMethods, componentName: string) {
    this.logger = logger;
    this.componentName = componentName;
  }

  /**
   * Log a message with consistent component name prefix
   *
   * @param level - Log level
   * @param message - Message to log (without prefix)
   * @param args - Additional arguments to pass to logger
   */
  protected log(
    level: 'debug' | 'info' | 'warn' | 'error',
    message: string,
    ...args: unknown[]
  ): void {
    const formattedMessage = `[${this.componentName}] ${message}`;
    this.logger[level](formattedMessage, ...args);
  }

  /**
   * Invoke an optional callback; a throwing callback is logged and does not
   * interrupt processing
   */
  protected notify<T>(
    callback: ((event: T) => void) | undefined,
    event: T,
  ): void {
    if (!callback) {
      return;
    }
    try {
      callback(event);
    } catch (error) {
      this.log('warn', 'Progress callback threw', error);
    }
  }
}

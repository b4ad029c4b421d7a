/**
 * Abstract Logger
 *
 * Base class for structured logging. The renderer and the CLI log through
 * the `logger` singleton; tests may substitute their own subclass.
 *
 * @see Logger for the concrete implementation
 */

/**
 * Context metadata attached to log entries.
 */
export interface LogContext {
  /** Component name (e.g., 'frame', 'scene', 'cli') */
  component?: string;
  /** Additional context fields */
  [key: string]: unknown;
}

/**
 * Abstract logger: leveled logging with structured context.
 */
export abstract class ALogger {
  /**
   * Log a debug message.
   */
  abstract debug(message: string, context?: LogContext): void;

  /**
   * Log an info message.
   */
  abstract info(message: string, context?: LogContext): void;

  /**
   * Log a warning message.
   */
  abstract warn(message: string, context?: LogContext): void;

  /**
   * Log an error message.
   */
  abstract error(message: string, error?: Error | unknown, context?: LogContext): void;
}

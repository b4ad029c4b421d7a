import { ALogger } from './ALogger.js';
import { isVerbose, isDebugLevel, LOG_LEVEL, VERBOSE_TIMING } from '../../config/env.js';
import type { LogContext } from './ALogger.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type { LogContext } from './ALogger.js';

/**
 * Extended context for verbose mode logging
 */
export interface VerboseContext extends LogContext {
  operation?: string;
  durationMs?: number;
}

const RESERVED_KEYS = ['component', 'operation', 'durationMs'];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger extends ALogger {
  private operationTimers = new Map<string, number>();
  private level: LogLevel = isDebugLevel() ? 'debug' : LOG_LEVEL;

  /**
   * Minimum level that reaches the console. Errors are always printed.
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: LogLevel): boolean {
    return level === 'error' || LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  /**
   * Start timing an operation (for verbose mode timing)
   */
  startOperation(operationId: string): void {
    if (VERBOSE_TIMING) {
      this.operationTimers.set(operationId, Date.now());
    }
  }

  /**
   * End timing an operation and return duration
   */
  endOperation(operationId: string): number | undefined {
    if (!VERBOSE_TIMING) return undefined;
    const startTime = this.operationTimers.get(operationId);
    if (startTime !== undefined) {
      this.operationTimers.delete(operationId);
      return Date.now() - startTime;
    }
    return undefined;
  }

  formatMessage(level: LogLevel, message: string, context?: VerboseContext): string {
    const timestamp = new Date().toISOString();
    const levelStr = level.toUpperCase().padEnd(5);

    let contextStr = '';
    if (context) {
      const parts: string[] = [];

      if (context.component) parts.push(`component=${context.component}`);
      if (context.operation) parts.push(`op=${context.operation}`);
      if (context.durationMs !== undefined) parts.push(`duration=${context.durationMs}ms`);

      // Other custom fields
      Object.keys(context).forEach(key => {
        if (!RESERVED_KEYS.includes(key) && context[key] !== undefined) {
          parts.push(`${key}=${String(context[key])}`);
        }
      });

      if (parts.length > 0) {
        contextStr = ` [${parts.join(', ')}]`;
      }
    }

    return `${timestamp} ${levelStr}${contextStr} ${message}`;
  }

  debug(message: string, context?: VerboseContext): void {
    if (this.isEnabled('debug')) {
      console.log(this.formatMessage('debug', message, context));
    }
  }

  info(message: string, context?: VerboseContext): void {
    if (!this.isEnabled('info')) return;
    console.log(this.formatMessage('info', message, context));
  }

  warn(message: string, context?: VerboseContext): void {
    if (!this.isEnabled('warn')) return;
    console.warn(this.formatMessage('warn', message, context));
  }

  error(message: string, error?: Error | unknown, context?: VerboseContext): void {
    console.error(this.formatMessage('error', message, context));
    if (error) {
      if (error instanceof Error) {
        console.error(`  Error: ${error.message}`);
        // In verbose mode or debug level, always show stack traces
        if (error.stack && (isVerbose() || isDebugLevel())) {
          console.error(`  Stack: ${error.stack}`);
        }
      } else {
        console.error(`  Details: ${JSON.stringify(error, null, 2)}`);
      }
    }
  }

  /**
   * Log with timing information (verbose mode)
   */
  timed(
    level: LogLevel,
    message: string,
    operationId: string,
    context?: VerboseContext
  ): void {
    const durationMs = this.endOperation(operationId);
    const verboseCtx: VerboseContext = {
      ...context,
      durationMs,
    };

    switch (level) {
      case 'debug':
        this.debug(message, verboseCtx);
        break;
      case 'info':
        this.info(message, verboseCtx);
        break;
      case 'warn':
        this.warn(message, verboseCtx);
        break;
      case 'error':
        this.error(message, undefined, verboseCtx);
        break;
    }
  }
}

export const logger = new Logger();

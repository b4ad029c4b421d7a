/**
 * Logging utilities
 * @module utils/logging
 */

export { ALogger, type LogContext } from './ALogger.js';
export { Logger, logger, type LogLevel, type VerboseContext } from './logger.js';

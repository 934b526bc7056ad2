/**
 * Logger Utility
 *
 * Leveled console logging with a `[scope]` prefix. The minimum level comes
 * from the LOG_LEVEL environment variable and is re-read on every call.
 *
 * Usage:
 *   import { createLogger } from '../utils/logger.js';
 *   const logger = createLogger('capture-store');
 *   logger.info('Capture deleted');
 *   logger.error('Request failed', error);
 *
 * Environment:
 *   LOG_LEVEL=DEBUG|INFO|WARNING|ERROR (default: INFO)
 *
 * @module
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Supported log levels in ascending severity order.
 */
export type LogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

/**
 * Logger interface with leveled logging methods.
 */
export interface Logger {
  /** Per-record mutations, query plans */
  debug(message: string, ...args: unknown[]): void;
  /** Cascades, server start, snapshot restores */
  info(message: string, ...args: unknown[]): void;
  /** Audit findings, rejected configuration */
  warn(message: string, ...args: unknown[]): void;
  /** Failed requests and operations */
  error(message: string, ...args: unknown[]): void;
  /** Logger whose prefix extends this one: `[parent:child]` */
  child(scope: string): Logger;
}

// ============================================================================
// Constants
// ============================================================================

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  ERROR: 3,
};

const DEFAULT_LOG_LEVEL: LogLevel = 'INFO';

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_VALUES, value);
}

// ============================================================================
// Log Level Resolution
// ============================================================================

/**
 * Resolves the current log level from LOG_LEVEL, falling back to INFO.
 * WARN is accepted as an alias of WARNING.
 */
export function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.trim().toUpperCase();
  if (envLevel === 'WARN') {
    return 'WARNING';
  }
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return DEFAULT_LOG_LEVEL;
}

/**
 * Checks whether a message at the given level passes the current minimum level.
 */
export function shouldLog(messageLevel: LogLevel): boolean {
  return LOG_LEVEL_VALUES[messageLevel] >= LOG_LEVEL_VALUES[getLogLevel()];
}

// ============================================================================
// Logger Factory
// ============================================================================

type ConsoleMethod = (...data: unknown[]) => void;

function emit(method: ConsoleMethod, level: LogLevel, prefix: string, message: string, args: unknown[]): void {
  if (!shouldLog(level)) {
    return;
  }
  if (args.length > 0) {
    method(prefix, message, ...args);
  } else {
    method(prefix, message);
  }
}

/**
 * Creates a scoped logger instance.
 *
 * @example
 * ```ts
 * const logger = createLogger('sprint-store');
 * logger.info('Sprint deleted');
 * // Output: [sprint-store] Sprint deleted
 *
 * logger.child('capacity').debug('Load recomputed');
 * // Only shown when LOG_LEVEL=DEBUG: [sprint-store:capacity] Load recomputed
 * ```
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;

  return {
    debug(message: string, ...args: unknown[]): void {
      emit(console.debug, 'DEBUG', prefix, message, args);
    },
    info(message: string, ...args: unknown[]): void {
      emit(console.log, 'INFO', prefix, message, args);
    },
    warn(message: string, ...args: unknown[]): void {
      emit(console.warn, 'WARNING', prefix, message, args);
    },
    error(message: string, ...args: unknown[]): void {
      emit(console.error, 'ERROR', prefix, message, args);
    },
    child(childScope: string): Logger {
      return createLogger(`${scope}:${childScope}`);
    },
  };
}

/**
 * Logging Types
 */

/**
 * Log level for controlling verbosity.
 * Levels are ordered by verbosity: silent < errors < warnings < info < debug
 */
export type LogLevel = 'silent' | 'errors' | 'warnings' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'errors', 'warnings', 'info', 'debug'];

/**
 * Logger interface for structured logging.
 * Compiler stages take a logger instead of writing to the console.
 */
export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  trace(message: string, context?: Record<string, unknown>): void;
  /** Logger that prefixes every message with `[scope]` */
  child(scope: string): Logger;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Logger - Lightweight logging for the Styx compiler
 *
 * Features:
 * - 5 log levels: silent, errors, warnings, info, debug
 * - Context support for structured logging
 * - Scoped child loggers (`[optimizer]`, `[compile]`)
 * - Console and file output (or both via MultiLogger)
 *
 * Usage:
 *   const logger = createLogger('info');
 *   logger.child('optimizer').debug('Folded struct', { id: 7 });
 *
 *   const logger = createLogger('info', { logFile: 'build/styx.log' });
 */

import { createWriteStream, writeFileSync, mkdirSync, statSync, type WriteStream } from 'node:fs';
import { dirname, resolve } from 'node:path';
import type { Logger, LogLevel } from '@styx/types';

export type { Logger, LogLevel };

type Method = 'error' | 'warn' | 'info' | 'debug' | 'trace';

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  silent: 0,
  errors: 1,
  warnings: 2,
  info: 3,
  debug: 4,
};

/**
 * Minimum level required for each method
 */
const METHOD_LEVELS: Record<Method, number> = {
  error: LOG_LEVEL_PRIORITY.errors,
  warn: LOG_LEVEL_PRIORITY.warnings,
  info: LOG_LEVEL_PRIORITY.info,
  debug: LOG_LEVEL_PRIORITY.debug,
  trace: LOG_LEVEL_PRIORITY.debug,
};

const METHOD_TAGS: Record<Method, string> = {
  error: 'ERROR',
  warn: 'WARN',
  info: 'INFO',
  debug: 'DEBUG',
  trace: 'TRACE',
};

/**
 * JSON.stringify that replaces circular references
 */
function safeStringify(obj: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(obj, (_key, value: unknown) => {
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }
    return value;
  });
}

export function formatMessage(message: string, context?: Record<string, unknown>): string {
  if (!context || Object.keys(context).length === 0) {
    return message;
  }
  try {
    return `${message} ${safeStringify(context)}`;
  } catch {
    return `${message} [context serialization failed]`;
  }
}

/**
 * Shared level filtering and scoping. Subclasses only decide where a line goes.
 */
abstract class BaseLogger implements Logger {
  protected readonly priority: number;

  constructor(level: LogLevel, protected readonly scopes: string[] = []) {
    this.priority = LOG_LEVEL_PRIORITY[level];
  }

  protected abstract emit(method: Method, message: string, context?: Record<string, unknown>): void;

  abstract child(scope: string): Logger;

  private log(method: Method, message: string, context?: Record<string, unknown>): void {
    if (this.priority < METHOD_LEVELS[method]) return;
    const prefix = this.scopes.map(scope => `[${scope}] `).join('');
    this.emit(method, prefix + message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log('trace', message, context);
  }
}

/**
 * Console-based Logger implementation
 */
export class ConsoleLogger extends BaseLogger {
  constructor(private readonly level: LogLevel = 'info', scopes: string[] = []) {
    super(level, scopes);
  }

  child(scope: string): Logger {
    return new ConsoleLogger(this.level, [...this.scopes, scope]);
  }

  protected emit(method: Method, message: string, context?: Record<string, unknown>): void {
    const line = formatMessage(`[${METHOD_TAGS[method]}] ${message}`, context);
    switch (method) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'info':
        console.info(line);
        break;
      case 'debug':
      case 'trace':
        console.debug(line);
        break;
    }
  }
}

/**
 * File-based Logger implementation
 *
 * Writes lines with ISO timestamps through a write stream. The file is
 * truncated on construction and parent directories are created.
 * Children share the parent's stream.
 */
export class FileLogger extends BaseLogger {
  private readonly stream: WriteStream;

  constructor(private readonly level: LogLevel, filePath: string | WriteStream, scopes: string[] = []) {
    super(level, scopes);
    if (typeof filePath !== 'string') {
      this.stream = filePath;
      return;
    }

    const resolvedPath = resolve(filePath);
    mkdirSync(dirname(resolvedPath), { recursive: true });

    let isDirectory = false;
    try {
      isDirectory = statSync(resolvedPath).isDirectory();
    } catch (e) {
      // ENOENT: the file is created below
      if (!(e instanceof Error && 'code' in e && e.code === 'ENOENT')) throw e;
    }
    if (isDirectory) {
      throw new Error(`Cannot write log file: '${resolvedPath}' is a directory`);
    }

    writeFileSync(resolvedPath, '');
    this.stream = createWriteStream(resolvedPath, { flags: 'a' });
    this.stream.on('error', (err: Error) => {
      console.error(`[ERROR] Log file write failed: ${err.message}`);
    });
  }

  child(scope: string): Logger {
    return new FileLogger(this.level, this.stream, [...this.scopes, scope]);
  }

  protected emit(method: Method, message: string, context?: Record<string, unknown>): void {
    const timestamp = new Date().toISOString();
    this.stream.write(formatMessage(`${timestamp} [${METHOD_TAGS[method]}] ${message}`, context) + '\n');
  }

  /** Flush and close the write stream. Returns when all data is written. */
  close(): Promise<void> {
    return new Promise((done) => {
      this.stream.end(done);
    });
  }
}

/**
 * Fan-out Logger; each inner logger applies its own level filtering.
 */
export class MultiLogger implements Logger {
  constructor(private readonly loggers: Logger[]) {}

  child(scope: string): Logger {
    return new MultiLogger(this.loggers.map(logger => logger.child(scope)));
  }

  error(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.error(message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.warn(message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.info(message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.debug(message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.trace(message, context);
  }

  async close(): Promise<void> {
    for (const logger of this.loggers) {
      if (logger instanceof FileLogger) {
        await logger.close();
      }
    }
  }
}

/**
 * Create a Logger with the given console level.
 *
 * With logFile, returns a MultiLogger; the file side always records at 'debug'.
 */
export function createLogger(level: LogLevel, options?: { logFile?: string }): Logger {
  const consoleLogger = new ConsoleLogger(level);

  if (options?.logFile) {
    return new MultiLogger([consoleLogger, new FileLogger('debug', options.logFile)]);
  }

  return consoleLogger;
}

/**
 * Logger that drops everything. Default for library entry points.
 */
export function silentLogger(): Logger {
  return new ConsoleLogger('silent');
}

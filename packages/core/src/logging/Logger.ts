/**
 * Logger - Lightweight logging for forkcov
 *
 * Features:
 * - 5 log levels: silent, errors, warnings, info, debug
 * - Context support for structured logging
 * - Console output goes to stderr so stdout stays reserved for reports
 * - Optional file output (console + file via MultiLogger)
 *
 * Usage:
 *   const logger = createLogger('info');
 *   logger.info('Derived branch report', { constructs: 12 });
 *
 *   const logger = createLogger('warnings', { logFile: '.forkcov/report.log' });
 */

import { createWriteStream, writeFileSync, mkdirSync, statSync, type WriteStream } from 'fs';
import { dirname, resolve } from 'path';

export type LogLevel = 'silent' | 'errors' | 'warnings' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'errors', 'warnings', 'info', 'debug'];

export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  trace(message: string, context?: Record<string, unknown>): void;
}

/**
 * Log level priorities (higher = more verbose)
 */
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
const METHOD_LEVELS = {
  error: LOG_LEVEL_PRIORITY.errors,
  warn: LOG_LEVEL_PRIORITY.warnings,
  info: LOG_LEVEL_PRIORITY.info,
  debug: LOG_LEVEL_PRIORITY.debug,
  trace: LOG_LEVEL_PRIORITY.debug,
};

/**
 * Parse a user-supplied level name. Returns null for unknown names.
 */
export function parseLogLevel(value: string): LogLevel | null {
  const normalized = value.trim().toLowerCase();
  return LOG_LEVELS.find(level => level === normalized) ?? null;
}

/**
 * JSON stringify that tolerates circular references and Maps
 */
function safeStringify(obj: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(obj, (_key, value: unknown) => {
    if (value instanceof Map) {
      return Object.fromEntries(value);
    }
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }
    return value;
  });
}

function formatMessage(message: string, context?: Record<string, unknown>): string {
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
 * Console-based Logger. Every level is written to stderr.
 */
export class ConsoleLogger implements Logger {
  private readonly priority: number;

  constructor(logLevel: LogLevel = 'warnings') {
    this.priority = LOG_LEVEL_PRIORITY[logLevel];
  }

  private write(methodLevel: number, label: string, message: string, context?: Record<string, unknown>): void {
    if (this.priority < methodLevel) return;
    console.error(formatMessage(`[${label}] ${message}`, context));
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write(METHOD_LEVELS.error, 'ERROR', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write(METHOD_LEVELS.warn, 'WARN', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write(METHOD_LEVELS.info, 'INFO', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write(METHOD_LEVELS.debug, 'DEBUG', message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.write(METHOD_LEVELS.trace, 'TRACE', message, context);
  }
}

/**
 * File-based Logger
 *
 * Writes lines with ISO timestamps through a write stream. The file is
 * truncated on construction and parent directories are created.
 */
export class FileLogger implements Logger {
  private readonly priority: number;
  private readonly stream: WriteStream;

  constructor(logLevel: LogLevel, filePath: string) {
    this.priority = LOG_LEVEL_PRIORITY[logLevel];
    const resolvedPath = resolve(filePath);

    mkdirSync(dirname(resolvedPath), { recursive: true });

    let isDirectory = false;
    try {
      isDirectory = statSync(resolvedPath).isDirectory();
    } catch {
      // File does not exist yet
    }
    if (isDirectory) {
      throw new Error(`Cannot write log file: '${resolvedPath}' is a directory`);
    }

    writeFileSync(resolvedPath, '');
    this.stream = createWriteStream(resolvedPath, { flags: 'a' });
    this.stream.on('error', (err: Error) => {
      console.error(`[WARN] Log file write failed: ${err.message}`);
    });
  }

  private writeLine(methodLevel: number, level: string, message: string, context?: Record<string, unknown>): void {
    if (this.priority < methodLevel) return;
    const timestamp = new Date().toISOString();
    this.stream.write(formatMessage(`${timestamp} [${level}] ${message}`, context) + '\n');
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.writeLine(METHOD_LEVELS.error, 'ERROR', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.writeLine(METHOD_LEVELS.warn, 'WARN', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.writeLine(METHOD_LEVELS.info, 'INFO', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.writeLine(METHOD_LEVELS.debug, 'DEBUG', message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.writeLine(METHOD_LEVELS.trace, 'TRACE', message, context);
  }

  /** Flush and close the write stream */
  close(): Promise<void> {
    return new Promise((done) => {
      this.stream.end(done);
    });
  }
}

/**
 * Delegates to several loggers; each applies its own level.
 */
export class MultiLogger implements Logger {
  private readonly loggers: Logger[];

  constructor(loggers: Logger[]) {
    this.loggers = loggers;
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
 * With `logFile`, returns a MultiLogger whose file side always records at
 * 'debug' level.
 */
export function createLogger(level: LogLevel, options?: { logFile?: string }): Logger {
  const consoleLogger = new ConsoleLogger(level);

  if (options?.logFile) {
    return new MultiLogger([consoleLogger, new FileLogger('debug', options.logFile)]);
  }

  return consoleLogger;
}

/** Logger that drops everything; default for library calls */
export const silentLogger: Logger = new ConsoleLogger('silent');

/**
 * Logger - Internal logging for msgstream itself
 *
 * Diagnostic channels are the product; this logger reports what the
 * library does (threshold trips, communicator mismatches, config fallbacks).
 *
 * Features:
 * - 5 log levels: silent, errors, warnings, info, debug
 * - Context support for structured logging
 * - Output through any OutputTarget (stderr by default), optional log file
 *
 * Usage:
 *   const logger = createLogger('info');
 *   logger.warn('Config fallback', { file: 'config.yaml' });
 *
 *   const logger = createLogger('warnings', { logFile: '.msgstream/msgstream.log' });
 */

import type { OutputTarget } from '@msgstream/types';
import { FileTarget, stderrTarget } from '../output/targets.js';
import { safeStringify } from '../output/format.js';

export type LogLevel = 'silent' | 'errors' | 'warnings' | 'info' | 'debug';

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

const METHOD_LEVELS = {
  error: LOG_LEVEL_PRIORITY.errors,
  warn: LOG_LEVEL_PRIORITY.warnings,
  info: LOG_LEVEL_PRIORITY.info,
  debug: LOG_LEVEL_PRIORITY.debug,
  trace: LOG_LEVEL_PRIORITY.debug,
};

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'errors', 'warnings', 'info', 'debug'];

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
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

export interface OutputLoggerOptions {
  /** Prefix each line with an ISO timestamp */
  timestamps?: boolean;
}

/**
 * Logger writing one line per call through an OutputTarget.
 *
 * Methods below the configured level are no-ops.
 */
export class OutputLogger implements Logger {
  readonly level: LogLevel;
  private readonly priority: number;
  private readonly target: OutputTarget;
  private readonly timestamps: boolean;

  constructor(logLevel: LogLevel = 'info', target: OutputTarget = stderrTarget(), options: OutputLoggerOptions = {}) {
    this.level = logLevel;
    this.priority = LOG_LEVEL_PRIORITY[logLevel];
    this.target = target;
    this.timestamps = options.timestamps ?? false;
  }

  private shouldLog(methodLevel: number): boolean {
    return this.priority >= methodLevel;
  }

  private writeLine(tag: string, message: string, context?: Record<string, unknown>): void {
    const head = this.timestamps ? `${new Date().toISOString()} [${tag}]` : `[${tag}]`;
    try {
      this.target.write(formatMessage(`${head} ${message}`, context) + '\n');
    } catch {
      // logging failures are ignored
    }
  }

  error(message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(METHOD_LEVELS.error)) return;
    this.writeLine('ERROR', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(METHOD_LEVELS.warn)) return;
    this.writeLine('WARN', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(METHOD_LEVELS.info)) return;
    this.writeLine('INFO', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(METHOD_LEVELS.debug)) return;
    this.writeLine('DEBUG', message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(METHOD_LEVELS.trace)) return;
    this.writeLine('TRACE', message, context);
  }

  /** Close the underlying target when it is a file. */
  close(): void {
    if (this.target instanceof FileTarget) {
      this.target.close();
    }
  }
}

/**
 * Delegates to several loggers, each filtering by its own level.
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

  close(): void {
    for (const logger of this.loggers) {
      if (logger instanceof OutputLogger) {
        logger.close();
      }
    }
  }
}

/**
 * Create a Logger with the given level, writing to stderr.
 *
 * With logFile, also writes timestamped lines to that file. The file
 * always captures at 'debug' level regardless of the console level.
 */
export function createLogger(level: LogLevel, options?: { logFile?: string }): Logger {
  const consoleLogger = new OutputLogger(level, stderrTarget());

  if (options?.logFile) {
    const fileLogger = new OutputLogger('debug', new FileTarget(options.logFile), { timestamps: true });
    return new MultiLogger([consoleLogger, fileLogger]);
  }

  return consoleLogger;
}

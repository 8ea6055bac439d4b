/**
 * Structured logging for run orchestration.
 *
 * Entries go to every registered sink. The console sink prints human-readable
 * lines; the file sink appends one JSON object per line.
 */

import { appendFileSync } from 'fs';
import chalk from 'chalk';
import { getErrorCategory, isValidationError } from '../../workflows/errors.js';

/**
 * Log levels, most verbose first. `action_info` carries the informational
 * output of individual actions and is hidden by `--quiet`.
 */
export type LogLevel = 'debug' | 'action_info' | 'info' | 'warn' | 'error';

/**
 * Structured log entry.
 */
export interface LogEntry {
  level: LogLevel;

  /**
   * Timestamp (ISO 8601).
   */
  timestamp: string;

  message: string;

  /**
   * Error details (if logging an error).
   */
  error?: {
    name: string;
    message: string;
    category: string;
    fatal: boolean;
    stack?: string;
  };

  context?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry) => void;

/**
 * Logger configuration.
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   * Default: 'action_info'
   */
  minLevel: LogLevel;

  /**
   * Whether to include stack traces in error logs.
   * Default: false
   */
  includeStackTraces: boolean;

  /**
   * Sinks receiving every entry at or above `minLevel`.
   * Default: the console sink
   */
  sinks: LogSink[];
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  action_info: 1,
  info: 2,
  warn: 3,
  error: 4,
};

export function isLogLevelEnabled(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

/**
 * Prints entries to the terminal. Warnings and errors go to stderr.
 */
export const consoleSink: LogSink = (entry) => {
  switch (entry.level) {
    case 'debug':
      console.log(chalk.dim(`[debug] ${entry.message}`));
      break;
    case 'action_info':
    case 'info':
      console.log(entry.message);
      break;
    case 'warn':
      console.error(chalk.yellow(`Warning: ${entry.message}`));
      break;
    case 'error':
      console.error(chalk.red(`Error: ${entry.message}`));
      if (entry.error?.stack) {
        console.error(chalk.dim(entry.error.stack));
      }
      break;
  }
};

/**
 * Appends entries to a file as JSON lines.
 */
export function createFileSink(path: string): LogSink {
  return (entry) => {
    appendFileSync(path, `${JSON.stringify(entry)}\n`, 'utf-8');
  };
}

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: 'action_info',
  includeStackTraces: false,
  sinks: [consoleSink],
};

export class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      ...DEFAULT_CONFIG,
      ...config,
      sinks: [...(config.sinks ?? DEFAULT_CONFIG.sinks)],
    };
  }

  get level(): LogLevel {
    return this.config.minLevel;
  }

  setLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  isEnabled(level: LogLevel): boolean {
    return isLogLevelEnabled(level, this.config.minLevel);
  }

  /**
   * Registers a sink and returns a function that removes it again.
   */
  addSink(sink: LogSink): () => void {
    this.config.sinks.push(sink);
    return () => {
      const index = this.config.sinks.indexOf(sink);
      if (index !== -1) {
        this.config.sinks.splice(index, 1);
      }
    };
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, { context });
  }

  actionInfo(message: string, context?: Record<string, unknown>): void {
    this.log('action_info', message, { context });
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, { context });
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, { context });
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, { error, context });
  }

  private log(
    level: LogLevel,
    message: string,
    options: { error?: Error; context?: Record<string, unknown> } = {}
  ): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      timestamp: new Date().toISOString(),
      message,
    };

    if (options.context) {
      entry.context = options.context;
    }

    if (options.error) {
      const error = options.error;
      entry.error = {
        name: error.name,
        message: error.message,
        category: getErrorCategory(error),
        fatal: isValidationError(error),
      };

      if (this.config.includeStackTraces && error.stack) {
        entry.error.stack = error.stack;
      }
    }

    for (const sink of this.config.sinks) {
      sink(entry);
    }
  }
}

/**
 * Logger shared by the command line entry point.
 */
const globalLogger = new Logger();

export function getLogger(): Logger {
  return globalLogger;
}

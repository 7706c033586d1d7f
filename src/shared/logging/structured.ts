/**
 * Structured Logging
 *
 * Levelled logging with json, text and pretty output, per-logger
 * context, and listeners for capturing entries in tests.
 */

import chalk from 'chalk';
import { getLogFormat, getLogLevel, isPlainLogsEnabled } from '../config/env.js';

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Additional context data */
  context?: Record<string, unknown>;
  /** Error details if applicable */
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

/**
 * Log output format
 */
export type LogFormat = 'json' | 'text' | 'pretty';

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level */
  level: LogLevel;
  format: LogFormat;
  includeStackTrace: boolean;
  includeTimestamp: boolean;
  /** Only applies to the text format */
  colorize: boolean;
  output: 'stdout' | 'stderr';
  /** Custom context to include in all logs */
  defaultContext?: Record<string, unknown>;
}

export interface Logger {
  debug: (message: string, context?: Record<string, unknown>) => void;
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>, error?: Error) => void;
  error: (message: string, context?: Record<string, unknown>, error?: Error) => void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  format: 'text',
  includeStackTrace: false,
  includeTimestamp: true,
  colorize: true,
  output: 'stderr',
};

let currentConfig: LoggerConfig = { ...DEFAULT_CONFIG };

type LogListener = (entry: LogEntry) => void;
const listeners: LogListener[] = [];

/**
 * Configure the structured logger
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  currentConfig = { ...currentConfig, ...config };
}

/**
 * Apply TEXT_CONTRACTS_LOG_* environment variables to the logger
 */
export function configureLoggerFromEnv(): LoggerConfig {
  configureLogger({
    level: getLogLevel(currentConfig.level),
    format: getLogFormat(currentConfig.format),
    colorize: currentConfig.colorize && !isPlainLogsEnabled(),
  });
  return getLoggerConfig();
}

/**
 * Get current logger configuration
 */
export function getLoggerConfig(): LoggerConfig {
  return { ...currentConfig };
}

/**
 * Add a log listener
 *
 * @returns a function that removes the listener again
 */
export function addLogListener(listener: LogListener): () => void {
  listeners.push(listener);
  return () => {
    const index = listeners.indexOf(listener);
    if (index >= 0) {
      listeners.splice(index, 1);
    }
  };
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[currentConfig.level];
}

function createEntry(
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>,
  error?: Error
): LogEntry {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
  };

  if (context || currentConfig.defaultContext) {
    entry.context = { ...currentConfig.defaultContext, ...context };
  }

  if (error) {
    entry.error = {
      name: error.name,
      message: error.message,
    };
    if ('code' in error && typeof error.code === 'string') {
      entry.error.code = error.code;
    }
    if (currentConfig.includeStackTrace && error.stack) {
      entry.error.stack = error.stack;
    }
  }

  return entry;
}

function formatText(entry: LogEntry, colorize: boolean): string {
  const paint = (fn: (text: string) => string, text: string): string =>
    colorize ? fn(text) : text;
  const parts: string[] = [];

  if (currentConfig.includeTimestamp) {
    parts.push(paint(chalk.dim, entry.timestamp));
  }

  parts.push(`[${paint(LEVEL_COLORS[entry.level], entry.level.toUpperCase().padEnd(5))}]`);
  parts.push(entry.message);

  if (entry.context && Object.keys(entry.context).length > 0) {
    const ctx = Object.entries(entry.context)
      .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
      .join(' ');
    parts.push(paint(chalk.dim, ctx));
  }

  if (entry.error) {
    parts.push(paint(chalk.red, `${entry.error.name}: ${entry.error.message}`));
  }

  let result = parts.join(' ');
  if (entry.error?.stack) {
    result += '\n' + paint(chalk.dim, entry.error.stack);
  }
  return result;
}

/**
 * Format a log entry according to config
 */
export function formatEntry(entry: LogEntry): string {
  switch (currentConfig.format) {
    case 'json':
      return JSON.stringify(entry);
    case 'pretty':
      return JSON.stringify(entry, null, 2);
    case 'text':
    default:
      return formatText(entry, currentConfig.colorize);
  }
}

function outputEntry(entry: LogEntry): void {
  const formatted = formatEntry(entry) + '\n';

  if (currentConfig.output === 'stdout') {
    process.stdout.write(formatted);
  } else {
    process.stderr.write(formatted);
  }

  for (const listener of listeners) {
    try {
      listener(entry);
    } catch (error) {
      // A failing listener must not break the caller's log statement
      process.stderr.write(
        `log listener failed: ${error instanceof Error ? error.message : String(error)}\n`
      );
    }
  }
}

function log(
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>,
  error?: Error
): void {
  if (!shouldLog(level)) return;
  outputEntry(createEntry(level, message, context, error));
}

export function logDebug(message: string, context?: Record<string, unknown>): void {
  log('debug', message, context);
}

export function logInfo(message: string, context?: Record<string, unknown>): void {
  log('info', message, context);
}

export function logWarn(message: string, context?: Record<string, unknown>, error?: Error): void {
  log('warn', message, context, error);
}

export function logError(message: string, context?: Record<string, unknown>, error?: Error): void {
  log('error', message, context, error);
}

/**
 * Create a child logger with preset context
 */
export function createChildLogger(defaultContext: Record<string, unknown>): Logger {
  return {
    debug: (message, context) =>
      log('debug', message, { ...defaultContext, ...context }),
    info: (message, context) =>
      log('info', message, { ...defaultContext, ...context }),
    warn: (message, context, error) =>
      log('warn', message, { ...defaultContext, ...context }, error),
    error: (message, context, error) =>
      log('error', message, { ...defaultContext, ...context }, error),
  };
}

/**
 * Log entries buffer for testing
 */
export class LogBuffer {
  private entries: LogEntry[] = [];
  private unsubscribe: (() => void) | undefined;

  start(): void {
    this.entries = [];
    this.unsubscribe = addLogListener((entry) => {
      this.entries.push(entry);
    });
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = undefined;
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getEntriesByLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((e) => e.level === level);
  }

  clear(): void {
    this.entries = [];
  }
}

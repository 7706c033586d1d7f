/**
 * Centralized Environment Variable Definitions
 *
 * All TEXT_CONTRACTS_* environment variables are defined here
 * to provide a single source of truth and avoid scattered parsing logic.
 */

import type { LogFormat, LogLevel } from '../logging/structured.js';

/**
 * Environment variable names used by text-contracts
 */
export const ENV_VARS = {
  // =============================================================================
  // Logging and Debug
  // =============================================================================

  /** Log level (debug, info, warn, error) */
  LOG_LEVEL: 'TEXT_CONTRACTS_LOG_LEVEL',

  /** Log format (json, text, pretty) */
  LOG_FORMAT: 'TEXT_CONTRACTS_LOG_FORMAT',

  /** Enable plain logs without color */
  PLAIN_LOGS: 'TEXT_CONTRACTS_PLAIN_LOGS',

  /** Debug mode flag (standard) */
  DEBUG: 'DEBUG',
} as const;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const LOG_FORMATS: readonly LogFormat[] = ['json', 'text', 'pretty'];

/**
 * Get environment variable value with optional default
 */
export function getEnv(name: string, defaultValue?: string): string | undefined {
  return process.env[name] ?? defaultValue;
}

/**
 * Get environment variable as boolean
 * Returns true for '1', 'true', 'yes' (case-insensitive)
 */
export function getEnvBoolean(name: string, defaultValue = false): boolean {
  const value = process.env[name];
  if (!value) return defaultValue;

  const normalized = value.trim().toLowerCase();
  return normalized === '1' || normalized === 'true' || normalized === 'yes';
}

/**
 * Get environment variable as integer
 */
export function getEnvInt(name: string, defaultValue: number): number {
  const value = process.env[name];
  if (!value) return defaultValue;

  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Check if debug mode is enabled
 * Checks both TEXT_CONTRACTS_LOG_LEVEL=debug and DEBUG environment variables
 */
export function isDebugEnabled(): boolean {
  const logLevel = (process.env[ENV_VARS.LOG_LEVEL] || '').trim().toLowerCase();
  const debugFlag = (process.env[ENV_VARS.DEBUG] || '').trim().toLowerCase();

  return (
    logLevel === 'debug' ||
    (debugFlag !== '' && debugFlag !== '0' && debugFlag !== 'false')
  );
}

/**
 * Check if plain logs are enabled (no color)
 */
export function isPlainLogsEnabled(): boolean {
  return getEnvBoolean(ENV_VARS.PLAIN_LOGS);
}

/**
 * Resolve the configured log level, ignoring unrecognized values
 */
export function getLogLevel(defaultLevel: LogLevel = 'info'): LogLevel {
  if (isDebugEnabled()) return 'debug';

  const raw = (getEnv(ENV_VARS.LOG_LEVEL) ?? '').trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === raw) ?? defaultLevel;
}

/**
 * Resolve the configured log format, ignoring unrecognized values
 */
export function getLogFormat(defaultFormat: LogFormat = 'text'): LogFormat {
  const raw = (getEnv(ENV_VARS.LOG_FORMAT) ?? '').trim().toLowerCase();
  return LOG_FORMATS.find((format) => format === raw) ?? defaultFormat;
}

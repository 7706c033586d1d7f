/**
 * Structured Logging Unit Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  configureLogger,
  configureLoggerFromEnv,
  getLoggerConfig,
  formatEntry,
  logDebug,
  logInfo,
  logWarn,
  logError,
  createChildLogger,
  LogBuffer,
  addLogListener,
} from '../../../src/shared/logging/structured.js';
import { ValueViolation } from '../../../src/shared/errors/index.js';

describe('Structured Logging', () => {
  let buffer: LogBuffer;
  const originalConfig = getLoggerConfig();

  beforeEach(() => {
    buffer = new LogBuffer();
    buffer.start();
    configureLogger({ level: 'debug', format: 'json', colorize: false });
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    buffer.stop();
    configureLogger({ ...originalConfig, defaultContext: undefined });
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  describe('configureLogger', () => {
    it('should merge with existing config', () => {
      configureLogger({ format: 'pretty' });
      configureLogger({ level: 'warn' });

      const config = getLoggerConfig();
      expect(config.format).toBe('pretty');
      expect(config.level).toBe('warn');
    });

    it('should read level and format from the environment', () => {
      vi.stubEnv('TEXT_CONTRACTS_LOG_LEVEL', 'warn');
      vi.stubEnv('TEXT_CONTRACTS_LOG_FORMAT', 'pretty');
      vi.stubEnv('DEBUG', '');

      const config = configureLoggerFromEnv();
      expect(config.level).toBe('warn');
      expect(config.format).toBe('pretty');
    });

    it('should keep the current level when the environment value is unknown', () => {
      vi.stubEnv('TEXT_CONTRACTS_LOG_LEVEL', 'verbose');
      vi.stubEnv('DEBUG', '');
      configureLogger({ level: 'error' });

      expect(configureLoggerFromEnv().level).toBe('error');
    });

    it('should disable colors for plain logs', () => {
      vi.stubEnv('TEXT_CONTRACTS_PLAIN_LOGS', '1');
      configureLogger({ colorize: true });

      expect(configureLoggerFromEnv().colorize).toBe(false);
    });
  });

  describe('Log levels', () => {
    it('should log at every level', () => {
      logDebug('Debug message');
      logInfo('Info message');
      logWarn('Warn message');
      logError('Error message');

      expect(buffer.getEntries().map((e) => e.level)).toEqual(['debug', 'info', 'warn', 'error']);
    });

    it('should filter by log level', () => {
      configureLogger({ level: 'warn' });

      logDebug('Debug');
      logInfo('Info');
      logWarn('Warn');
      logError('Error');

      const entries = buffer.getEntries();
      expect(entries).toHaveLength(2);
      expect(entries[0]?.level).toBe('warn');
      expect(entries[1]?.level).toBe('error');
    });
  });

  describe('Context', () => {
    it('should include context in log entry', () => {
      logInfo('Message', { key: 'value', num: 42 });
      expect(buffer.getEntries()[0]?.context).toEqual({ key: 'value', num: 42 });
    });

    it('should merge default context', () => {
      configureLogger({ defaultContext: { service: 'contracts' } });
      logInfo('Message', { key: 'value' });
      expect(buffer.getEntries()[0]?.context).toEqual({ service: 'contracts', key: 'value' });
    });

    it('should include error code and omit stack by default', () => {
      logError('Rejected', undefined, new ValueViolation('n', 0, 'must be positive'));

      expect(buffer.getEntries()[0]?.error).toEqual({
        name: 'ValueViolation',
        message: "Invalid value for 'n': must be positive",
        code: 'VALUE_VIOLATION',
      });
    });
  });

  describe('createChildLogger', () => {
    it('should prefix context on every call', () => {
      const child = createChildLogger({ component: 'contracts' });
      child.info('Checked', { operation: 'ngram' });

      expect(buffer.getEntries()[0]?.context).toEqual({ component: 'contracts', operation: 'ngram' });
    });
  });

  describe('Listeners', () => {
    it('should stop notifying after unsubscribe', () => {
      const seen: string[] = [];
      const unsubscribe = addLogListener((entry) => seen.push(entry.message));

      logInfo('first');
      unsubscribe();
      logInfo('second');

      expect(seen).toEqual(['first']);
    });

    it('should not let a failing listener break logging', () => {
      const unsubscribe = addLogListener(() => {
        throw new Error('listener broke');
      });

      expect(() => logInfo('still logged')).not.toThrow();
      unsubscribe();
      expect(buffer.getEntries().map((e) => e.message)).toEqual(['still logged']);
    });
  });

  describe('formatEntry', () => {
    const entry = {
      timestamp: '2024-01-01T00:00:00.000Z',
      level: 'warn' as const,
      message: 'Contract violated',
      context: { operation: 'ngram' },
    };

    it('should format text without colors', () => {
      configureLogger({ format: 'text', colorize: false });
      expect(formatEntry(entry)).toBe(
        '2024-01-01T00:00:00.000Z [WARN ] Contract violated operation="ngram"'
      );
    });

    it('should format text without timestamps', () => {
      configureLogger({ format: 'text', colorize: false, includeTimestamp: false });
      expect(formatEntry(entry)).toBe('[WARN ] Contract violated operation="ngram"');
    });

    it('should format json on one line', () => {
      configureLogger({ format: 'json' });
      expect(formatEntry(entry)).toBe(JSON.stringify(entry));
    });
  });
});

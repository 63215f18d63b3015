/**
 * Unit tests for the conditional logger
 */

import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  LogLevel,
  configureLogging,
  createConditionalLogger,
  formatLogMessage,
  isLoggingEnabled,
  parseLogLevel
} from './LoggingConfig';

describe('LoggingConfig', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('filters by level and by system', () => {
    configureLogging({ level: LogLevel.INFO, enabledSystems: ['*'], disabledSystems: ['noisy'] });

    expect(isLoggingEnabled('travel', LogLevel.INFO)).toBe(true);
    expect(isLoggingEnabled('travel', LogLevel.DEBUG)).toBe(false);
    expect(isLoggingEnabled('noisy', LogLevel.ERROR)).toBe(false);

    configureLogging({ enabledSystems: ['travel'], disabledSystems: [] });
    expect(isLoggingEnabled('travel', LogLevel.WARN)).toBe(true);
    expect(isLoggingEnabled('storage', LogLevel.WARN)).toBe(false);
  });

  it('formats messages without timestamps when disabled', () => {
    configureLogging({ enableTimestamps: false });

    expect(formatLogMessage('travel', 'WARN', 'slow load')).toBe('[travel] WARN: slow load');
  });

  it('writes enabled levels to the console', () => {
    configureLogging({ level: LogLevel.WARN, enabledSystems: ['*'], enableTimestamps: false, enableStackTraces: false });
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = createConditionalLogger('travel');
    logger.info('hidden');
    logger.warn('shown', { attempt: 1 });
    logger.error('failed', new Error('boom'));

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[travel] WARN: shown', { attempt: 1 });
    expect(error).toHaveBeenCalledWith('[travel] ERROR: failed - boom', '');
  });

  it('maps level names', () => {
    expect(parseLogLevel('none')).toBe(LogLevel.NONE);
    expect(parseLogLevel('trace')).toBe(LogLevel.TRACE);
  });
});

/**
 * Centralized logging configuration
 * Controls what gets logged based on environment and settings
 */

export enum LogLevel {
  NONE = 0,
  ERROR = 1,
  WARN = 2,
  INFO = 3,
  DEBUG = 4,
  TRACE = 5
}

export type LogLevelName = 'none' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export interface LogConfig {
  level: LogLevel;
  enabledSystems: string[];
  disabledSystems: string[];
  enableStackTraces: boolean;
  enableTimestamps: boolean;
}

const defaultConfig: LogConfig = {
  level: process.env.NODE_ENV === 'development' ? LogLevel.DEBUG : LogLevel.WARN,
  enabledSystems: ['*'],
  disabledSystems: [],
  enableStackTraces: process.env.NODE_ENV === 'development',
  enableTimestamps: true
};

// Global configuration (can be modified at runtime)
let globalConfig: LogConfig = { ...defaultConfig };

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  none: LogLevel.NONE,
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
  trace: LogLevel.TRACE
};

export function parseLogLevel(name: LogLevelName): LogLevel {
  return LEVELS_BY_NAME[name];
}

/**
 * Update logging configuration
 */
export function configureLogging(config: Partial<LogConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

export function resetLogging(): void {
  globalConfig = { ...defaultConfig };
}

/**
 * Check if logging is enabled for a system at a level
 */
export function isLoggingEnabled(systemName: string, level: LogLevel): boolean {
  if (level > globalConfig.level) {
    return false;
  }

  if (globalConfig.disabledSystems.includes(systemName)) {
    return false;
  }

  return globalConfig.enabledSystems.includes('*') ||
         globalConfig.enabledSystems.includes(systemName);
}

/**
 * Format log message with optional timestamp
 */
export function formatLogMessage(
  systemName: string,
  level: string,
  message: string
): string {
  const parts: string[] = [];

  if (globalConfig.enableTimestamps) {
    parts.push(new Date().toISOString());
  }

  parts.push(`[${systemName}]`);
  parts.push(`${level}:`);
  parts.push(message);

  return parts.join(' ');
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, error?: unknown, data?: unknown): void;
  trace(message: string, data?: unknown): void;
}

/**
 * Create a conditional logger that checks if logging is enabled
 */
export function createConditionalLogger(systemName: string): Logger {
  return {
    debug: (message, data) => {
      if (isLoggingEnabled(systemName, LogLevel.DEBUG)) {
        console.debug(formatLogMessage(systemName, 'DEBUG', message), data ?? '');
      }
    },
    info: (message, data) => {
      if (isLoggingEnabled(systemName, LogLevel.INFO)) {
        console.info(formatLogMessage(systemName, 'INFO', message), data ?? '');
      }
    },
    warn: (message, data) => {
      if (isLoggingEnabled(systemName, LogLevel.WARN)) {
        console.warn(formatLogMessage(systemName, 'WARN', message), data ?? '');
      }
    },
    error: (message, error, data) => {
      if (isLoggingEnabled(systemName, LogLevel.ERROR)) {
        const fullMessage = error === undefined
          ? message
          : `${message} - ${error instanceof Error ? error.message : String(error)}`;
        console.error(formatLogMessage(systemName, 'ERROR', fullMessage), data ?? '');

        if (globalConfig.enableStackTraces && error instanceof Error) {
          console.error(error.stack);
        }
      }
    },
    trace: (message, data) => {
      if (isLoggingEnabled(systemName, LogLevel.TRACE)) {
        console.trace(formatLogMessage(systemName, 'TRACE', message), data ?? '');
      }
    }
  };
}

/**
 * Example usage:
 *
 * // Quiet everything but errors
 * configureLogging({ level: LogLevel.ERROR });
 *
 * // Disable specific noisy systems
 * configureLogging({ disabledSystems: ['travel-resolver'] });
 */

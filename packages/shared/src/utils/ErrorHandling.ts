/**
 * Centralized error handling utilities
 */

import { createConditionalLogger, type Logger } from './LoggingConfig';

export enum ErrorSeverity {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARNING = 'WARNING',
  ERROR = 'ERROR',
  FATAL = 'FATAL'
}

export interface ErrorContext {
  system: string;
  method?: string;
  entityId?: string;
  details?: Record<string, unknown>;
}

const loggers = new Map<string, Logger>();

function loggerFor(system: string): Logger {
  let logger = loggers.get(system);
  if (!logger) {
    logger = createConditionalLogger(system);
    loggers.set(system, logger);
  }
  return logger;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Log error with consistent format and context
 */
export function logError(
  message: string,
  error: unknown,
  context: ErrorContext,
  severity: ErrorSeverity = ErrorSeverity.ERROR
): void {
  const logger = loggerFor(context.system);
  const prefix = context.method ? `${context.method}: ` : '';
  const errorMessage = toError(error).message;
  const fullMessage = `${prefix}${message} - ${errorMessage}`;

  switch (severity) {
    case ErrorSeverity.DEBUG:
      logger.debug(fullMessage, context.details);
      break;
    case ErrorSeverity.INFO:
      logger.info(fullMessage, context.details);
      break;
    case ErrorSeverity.WARNING:
      logger.warn(fullMessage, context.details);
      break;
    case ErrorSeverity.ERROR:
      logger.error(`${prefix}${message}`, toError(error), context.details);
      break;
    case ErrorSeverity.FATAL:
      logger.error(`FATAL: ${prefix}${message}`, toError(error), context.details);
      break;
  }
}

/**
 * Run a synchronous query that is allowed to fail; a throw becomes null
 */
export function tryOrNull<T>(
  fn: () => T | null | undefined,
  context: ErrorContext,
  severity: ErrorSeverity = ErrorSeverity.DEBUG
): T | null {
  try {
    return fn() ?? null;
  } catch (error) {
    logError('Operation failed', error, context, severity);
    return null;
  }
}

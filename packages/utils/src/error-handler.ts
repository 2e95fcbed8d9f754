/**
 * Error Handler
 * =============
 * Centralized error logging for command entry points.
 */

import { AppError, isOperationalError } from './errors.js';
import { logger } from './logger.js';

export interface ErrorHandlerResult {
  handled: boolean;
  message: string;
  code: string;
}

/**
 * Handle and log error appropriately
 */
export function handleError(error: unknown, context?: Record<string, unknown>): ErrorHandlerResult {
  const err = error instanceof Error ? error : new Error(String(error));

  if (err instanceof AppError) {
    if (isOperationalError(err)) {
      logger.warn('Operational error occurred', {
        ...err.context,
        ...context,
        error: {
          name: err.name,
          message: err.message,
          code: err.code,
        },
      });
    } else {
      logger.error('Application error occurred', err, {
        ...err.context,
        ...context,
      });
    }
    return { handled: true, message: err.message, code: err.code };
  }

  logger.error('Unknown error occurred', err, context);
  return { handled: true, message: err.message, code: 'UNKNOWN_ERROR' };
}

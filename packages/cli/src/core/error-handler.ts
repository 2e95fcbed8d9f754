/**
 * Error Handler - User-facing error messages for the CLI
 */

import { AppError, isConfigurationError, handleError as logHandledError } from '@gcmrun/utils';

export const EXIT_FAILURE = 1;
/** Configuration and dependency errors: rerunning unchanged fails the same way */
export const EXIT_CONFIGURATION = 2;
export const EXIT_INTERRUPTED = 130;

/**
 * Format error for user display
 */
export function formatError(error: unknown): string {
  if (error instanceof AppError) {
    return `${error.message} [${error.code}]`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'An unexpected error occurred';
}

/**
 * Log the error with full context and return the message to print
 */
export function handleError(error: unknown, context?: Record<string, unknown>): string {
  logHandledError(error, context);
  return formatError(error);
}

/**
 * Process exit code for a command that threw
 */
export function exitCodeFor(error: unknown, interrupted: boolean): number {
  if (interrupted) {
    return EXIT_INTERRUPTED;
  }
  return isConfigurationError(error) ? EXIT_CONFIGURATION : EXIT_FAILURE;
}

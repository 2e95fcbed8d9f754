/**
 * @gcmrun/utils - Shared utilities package
 *
 * Public API exports for the utils package:
 * - Logger utilities
 * - Runner configuration loading
 * - Error taxonomy and handling
 */

export {
  logger,
  Logger,
  LogLevel,
  type LogContext,
  winstonLogger,
  createLogger,
  addFileTransport,
  removeFileTransport,
} from './logger.js';

export * from './config/index.js';

export * from './errors.js';
export { handleError, type ErrorHandlerResult } from './error-handler.js';

/**
 * Logger Port
 *
 * What the run controller needs from a logger. `Logger` from @gcmrun/utils
 * satisfies it; tests pass a recording sink.
 */
export interface LoggerPort {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
}

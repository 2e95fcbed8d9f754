/**
 * Custom Error Classes
 * ====================
 * Error taxonomy for experiment configuration and run execution.
 *
 * Configuration, dependency and execution errors are never retried
 * automatically; a user-initiated interrupt is not an error at all and is
 * reported as a run outcome instead.
 */

export type ErrorContext = Record<string, unknown>;

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly context?: ErrorContext;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string = 'APP_ERROR',
    context?: ErrorContext,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      isOperational: this.isOperational,
      stack: this.stack,
    };
  }
}

/**
 * Validation error - for input validation failures
 */
export class ValidationError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'VALIDATION_ERROR', context);
  }
}

/**
 * Not found error - for missing resources
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string, context?: ErrorContext) {
    const message = identifier
      ? `${resource} with identifier '${identifier}' not found`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', { resource, identifier, ...context });
  }
}

/**
 * Configuration error - raised before any process is launched
 */
export class ConfigurationError extends AppError {
  constructor(message: string, configKey?: string, context?: ErrorContext, code = 'CONFIGURATION_ERROR') {
    super(message, code, { configKey, ...context });
  }
}

/**
 * A namelist source could not be read or parsed
 */
export class NamelistParseError extends ConfigurationError {
  public readonly source: string;
  public readonly line?: number;

  constructor(message: string, source: string, line?: number) {
    const where = line !== undefined ? `${source}:${line}` : source;
    super(`${where}: ${message}`, 'namelist', { source, line }, 'NAMELIST_PARSE_ERROR');
    this.source = source;
    this.line = line;
  }
}

/**
 * More compilation inputs are missing than the experiment tolerates
 */
export class CompilationInputError extends ConfigurationError {
  public readonly missing: string[];

  constructor(missing: string[], tolerance: number) {
    super(
      `Missing ${missing.length} compilation files (tolerance ${tolerance})`,
      'pathNames',
      { missing, tolerance },
      'COMPILATION_INPUT_ERROR'
    );
    this.missing = missing;
  }
}

/**
 * A run's restart dependency is not satisfied
 */
export class DependencyError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'DEPENDENCY_ERROR', context);
  }
}

/**
 * The external executable failed, or monitoring it threw
 */
export class ExecutionError extends AppError {
  public readonly exitCode?: number;
  public readonly signal?: string;

  constructor(message: string, details: { exitCode?: number; signal?: string } = {}, context?: ErrorContext) {
    super(message, 'EXECUTION_ERROR', { ...details, ...context });
    this.exitCode = details.exitCode;
    this.signal = details.signal;
  }
}

/**
 * Another run already holds the experiment's run lock
 */
export class RunInProgressError extends AppError {
  constructor(experiment: string, lockPath: string, holderPid?: number) {
    super(
      `Experiment '${experiment}' already has a run in progress`,
      'RUN_IN_PROGRESS',
      { experiment, lockPath, holderPid }
    );
  }
}

/**
 * Check if error is an operational error (expected errors that should be handled)
 */
export function isOperationalError(error: unknown): boolean {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}

/**
 * Configuration and dependency errors are fixed by the user, not by retrying
 */
export function isConfigurationError(error: unknown): boolean {
  return error instanceof ConfigurationError || error instanceof DependencyError;
}

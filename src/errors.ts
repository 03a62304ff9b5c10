/**
 * @file serialsim Error Types
 * @description Error classes raised while building or configuring the serial engines.
 * Runtime protocol faults (frame errors, overruns, busy rejections) are never thrown;
 * they are reported as flags, counters and boolean results.
 * @module errors
 */

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base error class for all serialsim errors.
 * Provides a consistent error structure with error codes and context.
 */
export class SerialSimError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;
  /** Additional context about the error */
  readonly context?: Record<string, unknown>;

  /**
   * Creates a new SerialSimError.
   * @param message - Human-readable error message
   * @param code - Error code for programmatic handling
   * @param context - Optional additional context
   */
  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'SerialSimError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
    // Maintains proper stack trace in V8
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Error thrown when an engine or system configuration is invalid.
 */
export class ConfigurationError extends SerialSimError {
  /** Every validation problem found, in the order it was found */
  readonly problems: readonly string[];

  constructor(message: string, problems: readonly string[] = [], context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', { ...context, problems });
    this.name = 'ConfigurationError';
    this.problems = problems;
  }

  /**
   * Creates an error that lists every problem of a failed validation.
   * @param subject - What was being validated (e.g. "SPI master")
   * @param problems - Validation error messages
   */
  static fromProblems(subject: string, problems: readonly string[]): ConfigurationError {
    return new ConfigurationError(
      `Invalid ${subject} configuration: ${problems.join('; ')}`,
      problems
    );
  }
}

/**
 * Error thrown when a configuration file cannot be read or parsed.
 */
export class ConfigFileError extends SerialSimError {
  /** The file that failed to load */
  readonly filePath: string;

  constructor(message: string, filePath: string, cause?: unknown) {
    super(message, 'CONFIG_FILE_ERROR', {
      filePath,
      cause: cause instanceof Error ? cause.message : cause,
    });
    this.name = 'ConfigFileError';
    this.filePath = filePath;
  }
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Checks if an error is a SerialSimError.
 */
export function isSerialSimError(error: unknown): error is SerialSimError {
  return error instanceof SerialSimError;
}

/**
 * Checks if an error is a ConfigurationError.
 */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

/**
 * Extracts a human-readable message from any error type.
 * @param error - The error to extract a message from
 * @returns A string message
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}

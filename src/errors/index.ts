import { JadeModeErrorCode } from './codes.js';

// Re-export for consumers
export { JadeModeErrorCode } from './codes.js';

/**
 * Severity levels for errors
 */
export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

/**
 * Base error class for all jade-mode errors.
 *
 * The editing engine itself never throws one of these: navigation and
 * indentation report misses as results. Errors come from the edges
 * (configuration, file access, command input, mode registration).
 */
export class JadeModeError extends Error {
  constructor(
    message: string,
    public readonly code: JadeModeErrorCode,
    public readonly context?: Record<string, unknown>,
    public readonly severity: ErrorSeverity = 'medium',
    public readonly recoverable: boolean = true,
  ) {
    super(message);
    this.name = 'JadeModeError';

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for `--json` command output
   */
  toJSON() {
    return {
      error: this.message,
      code: this.code,
      severity: this.severity,
      recoverable: this.recoverable,
      context: this.context,
    };
  }

  isRecoverable(): boolean {
    return this.recoverable;
  }
}

/**
 * Configuration-related errors (loading, parsing, validation)
 */
export class ConfigError extends JadeModeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, JadeModeErrorCode.CONFIG_INVALID, context, 'medium', true);
    this.name = 'ConfigError';
  }
}

/**
 * Bad command input: unsupported file type, non-numeric counts, missing files
 */
export class InputError extends JadeModeError {
  constructor(
    message: string,
    code: JadeModeErrorCode = JadeModeErrorCode.INVALID_INPUT,
    context?: Record<string, unknown>,
  ) {
    super(message, code, context, 'low', true);
    this.name = 'InputError';
  }
}

/**
 * Helper function to wrap unknown errors with context
 * @param error - Unknown error object to wrap
 * @param context - Context message describing what operation failed
 * @param additionalContext - Optional additional context data
 */
export function wrapError(
  error: unknown,
  context: string,
  additionalContext?: Record<string, unknown>,
): JadeModeError {
  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  const wrappedError = new JadeModeError(
    `${context}: ${message}`,
    JadeModeErrorCode.INTERNAL_ERROR,
    additionalContext,
  );

  // Preserve original stack trace if available
  if (stack) {
    wrappedError.stack = `${wrappedError.stack}\n\nCaused by:\n${stack}`;
  }

  return wrappedError;
}

/**
 * Type guard to check if an error is a JadeModeError
 */
export function isJadeModeError(error: unknown): error is JadeModeError {
  return error instanceof JadeModeError;
}

/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Extract stack trace from unknown error type
 */
export function getErrorStack(error: unknown): string | undefined {
  if (error instanceof Error) {
    return error.stack;
  }
  return undefined;
}

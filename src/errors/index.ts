import { types } from 'util';
import { ErrorCode, ErrorSeverity, type ErrorContext, type ErrorDetails } from './types.js';

/**
 * Base error class for zramfree
 * Every fatal condition of a run is one of these; the CLI turns it into a
 * single diagnostic line and an exit status
 */
export class ZramfreeError extends Error {
  public readonly code: ErrorCode;
  public readonly severity: ErrorSeverity;
  public readonly context?: ErrorContext;
  public readonly timestamp: number;
  public readonly originalError?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    context?: ErrorContext,
    originalError?: Error
  ) {
    super(message);
    this.name = 'ZramfreeError';
    this.code = code;
    this.severity = severity;
    this.context = context;
    this.timestamp = Date.now();
    this.originalError = originalError;

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON format
   */
  toJSON(): ErrorDetails {
    return {
      code: this.code,
      message: this.message,
      severity: this.severity,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  /**
   * Convert error to string representation
   */
  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

/**
 * Command-line misuse: conflicting flags, bad values, wrong platform
 */
export class UsageError extends ZramfreeError {
  constructor(message: string, code: ErrorCode = ErrorCode.USAGE_ERROR, context?: ErrorContext) {
    super(message, code, ErrorSeverity.LOW, context);
    this.name = 'UsageError';
  }
}

/**
 * Configuration-related errors
 */
export class ConfigurationError extends ZramfreeError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.CONFIGURATION_ERROR, ErrorSeverity.HIGH, context, originalError);
    this.name = 'ConfigurationError';
  }
}

/**
 * A source that must exist could not be read
 */
export class SourceReadError extends ZramfreeError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.SOURCE_READ_ERROR, ErrorSeverity.HIGH, context, originalError);
    this.name = 'SourceReadError';
  }
}

/**
 * A kernel interface was not laid out the way it always is
 */
export class SourceFormatError extends ZramfreeError {
  constructor(message: string, context?: ErrorContext) {
    super(message, ErrorCode.SOURCE_FORMAT_ERROR, ErrorSeverity.HIGH, context);
    this.name = 'SourceFormatError';
  }
}

/**
 * The running kernel lacks an interface this tool relies on
 */
export class UnsupportedKernelError extends ZramfreeError {
  constructor(message: string, context?: ErrorContext) {
    super(message, ErrorCode.UNSUPPORTED_KERNEL, ErrorSeverity.HIGH, context);
    this.name = 'UnsupportedKernelError';
  }
}

/**
 * A system layout this tool does not handle, such as several disk swap devices
 */
export class UnsupportedConfigurationError extends ZramfreeError {
  constructor(message: string, code: ErrorCode, context?: ErrorContext) {
    super(message, code, ErrorSeverity.MEDIUM, context);
    this.name = 'UnsupportedConfigurationError';
  }
}

/**
 * Broken internal assumption
 */
export class InternalError extends ZramfreeError {
  constructor(message: string, context?: ErrorContext) {
    super(message, ErrorCode.INTERNAL_ERROR, ErrorSeverity.CRITICAL, context);
    this.name = 'InternalError';
  }
}

/**
 * Process exit status for an error: 2 for misuse, 1 for everything else
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof UsageError ? 2 : 1;
}

/**
 * Error test that also holds for errors raised by Node's own modules,
 * which come from another realm under test sandboxes
 */
export function isError(error: unknown): error is Error {
  return types.isNativeError(error);
}

/**
 * Node system error (ENOENT, EISDIR, ...)
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return isError(error) && 'code' in error;
}

/**
 * Message of anything thrown
 */
export function errorMessage(error: unknown): string {
  return isError(error) ? error.message : String(error);
}

// Export types
export { ErrorCode, ErrorSeverity, type ErrorContext, type ErrorDetails } from './types.js';

/**
 * Error types and error codes for zramfree
 * Codes are grouped by range so a diagnostic can be traced to its layer
 */

export enum ErrorCode {
  // General errors (1000-1999)
  UNKNOWN_ERROR = 1000,
  INTERNAL_ERROR = 1001,
  CONFIGURATION_ERROR = 1002,

  // Usage errors (2000-2999)
  USAGE_ERROR = 2000,
  CONFLICTING_UNITS = 2001,
  INVALID_OPTION = 2002,
  UNSUPPORTED_PLATFORM = 2003,

  // Source errors (3000-3999)
  SOURCE_READ_ERROR = 3000,
  SOURCE_FORMAT_ERROR = 3001,

  // Unsupported system errors (4000-4999)
  UNSUPPORTED_KERNEL = 4000,
  MULTIPLE_DISK_SWAP = 4001,
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

export interface ErrorContext {
  [key: string]: unknown;
}

export interface ErrorDetails {
  code: ErrorCode;
  message: string;
  severity: ErrorSeverity;
  context?: ErrorContext;
  timestamp: number;
  stack?: string;
}

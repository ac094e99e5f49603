/**
 * Coordinator Error Types
 *
 * Structured errors carrying a code, a severity and optional details.
 */

import { ErrorCode, ErrorSeverity } from './error-codes.js';

/**
 * Base coordinator error
 */
export class CoordinatorError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    public readonly severity: ErrorSeverity = ErrorSeverity.ERROR,
    public readonly details?: Record<string, unknown>,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'CoordinatorError';

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CoordinatorError);
    }
  }

  /**
   * Convert to a plain object for log context
   */
  toStructured(): {
    error: string;
    code: ErrorCode;
    severity: ErrorSeverity;
    details?: Record<string, unknown>;
    stack?: string;
  } {
    return {
      error: this.message,
      code: this.code,
      severity: this.severity,
      details: this.details,
      stack: this.stack,
    };
  }
}

/**
 * A window or element query failed. Always transient from the
 * coordinator's point of view.
 */
export class HostQueryError extends CoordinatorError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.HOST_ELEMENT_QUERY_FAILED,
    details?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, ErrorSeverity.WARNING, details, cause);
    this.name = 'HostQueryError';
  }
}

export class AnalysisError extends CoordinatorError {
  constructor(message: string, details?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorCode.ANALYSIS_FAILED, ErrorSeverity.ERROR, details, cause);
    this.name = 'AnalysisError';
  }
}

export class ConfigurationError extends CoordinatorError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INVALID_CONFIG,
    details?: Record<string, unknown>
  ) {
    super(message, code, ErrorSeverity.CRITICAL, details);
    this.name = 'ConfigurationError';
  }
}

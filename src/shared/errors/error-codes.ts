/**
 * Error Codes
 *
 * Stable identifiers for failures raised inside the coordinator.
 */

export enum ErrorCode {
  // Host queries
  HOST_WINDOW_QUERY_FAILED = 'HOST_WINDOW_QUERY_FAILED',
  HOST_ELEMENT_QUERY_FAILED = 'HOST_ELEMENT_QUERY_FAILED',
  HOST_TEXT_EXTRACTION_FAILED = 'HOST_TEXT_EXTRACTION_FAILED',

  // Analysis
  ANALYSIS_FAILED = 'ANALYSIS_FAILED',

  // Configuration
  INVALID_CONFIG = 'INVALID_CONFIG',
  INVALID_PROFILE = 'INVALID_PROFILE',

  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export enum ErrorSeverity {
  DEBUG = 'debug',
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
  CRITICAL = 'critical',
}

/**
 * Defines the severity levels for errors, allowing for prioritized handling.
 */
export enum ErrorSeverity {
  LOW = "low",
  MEDIUM = "medium",
  HIGH = "high",
  CRITICAL = "critical",
}

/**
 * Error codes surfaced in logs and in the JSON error envelope
 */
export enum ErrorCode {
  UNKNOWN_ERROR = "UNKNOWN_ERROR",
  CONFIGURATION_ERROR = "CONFIGURATION_ERROR",

  // Origin failures
  UPSTREAM_ERROR = "UPSTREAM_ERROR",
  UPSTREAM_TIMEOUT = "UPSTREAM_TIMEOUT",
  UPSTREAM_BAD_STATUS = "UPSTREAM_BAD_STATUS",
  UPSTREAM_TRUNCATED = "UPSTREAM_TRUNCATED",

  // Disk cache
  CACHE_WRITE_FAILED = "CACHE_WRITE_FAILED",
  CACHE_READ_CORRUPT = "CACHE_READ_CORRUPT",

  // Request handling
  METHOD_NOT_ALLOWED = "METHOD_NOT_ALLOWED",
  HTTP_EXCEPTION = "HTTP_EXCEPTION",
}

export interface IErrorDetails {
  /**
   * Machine-readable error code
   */
  code: string;

  /**
   * Human-readable error message
   */
  message: string;

  severity: ErrorSeverity;

  /**
   * Module name where the error originated
   */
  module?: string;

  timestamp?: number;

  /**
   * Additional context about the error
   */
  context?: Record<string, unknown>;
}

/**
 * Standardized error response for APIs.
 */
export interface StandardErrorResponse {
  success: false;
  error: IErrorDetails;
  timestamp: number;
  requestId: string;
  retryable: boolean;
}

/**
 * Type guard to check if an object is a StandardErrorResponse
 */
export function isStandardErrorResponse(obj: unknown): obj is StandardErrorResponse {
  return (
    typeof obj === "object" &&
    obj !== null &&
    "success" in obj &&
    obj.success === false &&
    "error" in obj &&
    typeof obj.error === "object" &&
    obj.error !== null
  );
}

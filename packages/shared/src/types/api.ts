/**
 * API response envelope used by the diagnostics server,
 * and the error codes every processor failure carries.
 */

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ApiError;
}

export interface ApiError {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/** Failure taxonomy of the processor. */
export type ProcessorErrorCode =
  | 'NOT_FOUND'
  | 'MALFORMED'
  | 'INVALID_DEFINITION'
  | 'SCHEMA_VIOLATION'
  | 'TYPE_VIOLATION'
  | 'UNRECOGNIZED_OUTPUT_FORMAT'
  | 'UNRESOLVED_CITATIONS'
  | 'RUNNER_FAILURE'
  | 'DEPENDENCY_UNAVAILABLE';

export type ErrorCode =
  | ProcessorErrorCode
  | 'VALIDATION_ERROR'
  | 'BAD_REQUEST'
  | 'INTERNAL_ERROR';

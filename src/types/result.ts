/**
 * Result Pattern
 *
 * Service operations return Result<T> for every expected outcome.
 * Only programming errors escape as exceptions.
 */

/**
 * Error codes surfaced by the service layer
 */
export type ErrorCode =
  | 'NOT_FOUND'
  | 'FILE_UNAVAILABLE'
  | 'DURABILITY_FAILURE'
  | 'UNSUPPORTED_OPERATION'
  | 'VALIDATION_ERROR'
  | 'FILE_TOO_LARGE'
  | 'UNAUTHORIZED'
  | 'INTERNAL_ERROR';

export interface Success<T> {
  success: true;
  data: T;
}

export interface Failure {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}

export type Result<T> = Success<T> | Failure;

export function success<T>(data: T): Success<T> {
  return { success: true, data };
}

export function failure(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): Failure {
  const error: Failure['error'] = { code, message };
  if (details !== undefined) {
    error.details = details;
  }
  return {
    success: false,
    error,
  };
}

export function isSuccess<T>(result: Result<T>): result is Success<T> {
  return result.success === true;
}

export function isFailure<T>(result: Result<T>): result is Failure {
  return result.success === false;
}

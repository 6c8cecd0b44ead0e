/**
 * Result Pattern
 *
 * Services and the CLI invoker return Result<T> for every expected failure.
 * Only programming errors escape as exceptions (and end up in onError).
 */

/**
 * Error codes shared by the invoker, the services and the HTTP layer
 */
export type ErrorCode =
  | 'UNAUTHORIZED'
  | 'INVALID_REQUEST'
  | 'AUTHENTICATION_REQUIRED'
  | 'USAGE_LIMIT_REACHED'
  | 'SESSION_INVALID'
  | 'TIMEOUT'
  | 'EXECUTION_FAILED'
  | 'NOT_FOUND'
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

/**
 * API Layer Types
 * Types specific to the HTTP/API layer
 */

import type { ErrorCode } from '../types/index.js';

/**
 * Extended Hono context
 */
declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
  }
}

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
    requestId: string;
  };
}

export type ErrorStatus = 400 | 401 | 404 | 409 | 500 | 502 | 503 | 504;

/**
 * Error code to HTTP status mapping
 */
export const ERROR_STATUS_MAP: Record<ErrorCode, ErrorStatus> = {
  UNAUTHORIZED: 401,
  INVALID_REQUEST: 400,
  NOT_FOUND: 404,
  SESSION_INVALID: 409,
  INTERNAL_ERROR: 500,
  EXECUTION_FAILED: 502,
  AUTHENTICATION_REQUIRED: 503,
  USAGE_LIMIT_REACHED: 503,
  TIMEOUT: 504,
};

export function getErrorStatus(code: ErrorCode): ErrorStatus {
  return ERROR_STATUS_MAP[code];
}

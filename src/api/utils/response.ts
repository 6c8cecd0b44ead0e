/**
 * API Response Helpers
 * Standardized error formatting
 */

import type { Context } from 'hono';

import type { Failure } from '../../types/index.js';
import { getErrorStatus } from '../types.js';
import type { ErrorResponse } from '../types.js';

/**
 * Create error response from a service failure
 */
export function errorResponse(
  c: Context,
  error: Failure['error'],
  requestId: string
): Response {
  const body: ErrorResponse = {
    error: {
      code: error.code,
      message: error.message,
      ...(error.details !== undefined && { details: error.details }),
      requestId,
    },
  };

  return c.json(body, getErrorStatus(error.code));
}

/**
 * Request id set by the request-context middleware
 */
export function getRequestId(c: Context): string {
  return c.get('requestId') || 'unknown';
}

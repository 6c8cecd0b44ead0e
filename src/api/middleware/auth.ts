/**
 * Auth Middleware
 * Checks the static bearer token from CLAUDE_API_KEY
 *
 * The comparison runs over SHA-256 digests so it takes the same time
 * whatever the length or content of the presented token.
 */

import { createHash, timingSafeEqual } from 'node:crypto';

import type { Context, Next } from 'hono';

import type { Logger } from '../../lib/logger.js';
import { errorResponse, getRequestId } from '../utils/response.js';

interface AuthMiddlewareDeps {
  apiKey: string;
  logger: Logger;
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

export function tokensMatch(presented: string, expected: string): boolean {
  return timingSafeEqual(digest(presented), digest(expected));
}

/**
 * Create auth middleware for protected routes
 */
export function createAuthMiddleware(deps: AuthMiddlewareDeps) {
  const { apiKey, logger } = deps;

  return async function authMiddleware(c: Context, next: Next) {
    const requestId = getRequestId(c);

    const authHeader = c.req.header('Authorization');
    const token =
      authHeader !== undefined && authHeader.startsWith('Bearer ')
        ? authHeader.slice(7).trim()
        : '';

    if (token === '') {
      return errorResponse(
        c,
        {
          code: 'UNAUTHORIZED',
          message: 'Missing or invalid authorization header',
        },
        requestId
      );
    }

    if (!tokensMatch(token, apiKey)) {
      logger.warn({ requestId, path: c.req.path }, 'Rejected invalid API key');
      return errorResponse(
        c,
        { code: 'UNAUTHORIZED', message: 'Invalid API key' },
        requestId
      );
    }

    await next();
  };
}

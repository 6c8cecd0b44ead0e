/**
 * Request Context Middleware
 * Assigns every request an id, echoed back as X-Request-Id
 */

import type { Context, Next } from 'hono';
import { nanoid } from 'nanoid';

export const REQUEST_ID_HEADER = 'X-Request-Id';

export function createRequestContextMiddleware() {
  return async function requestContextMiddleware(c: Context, next: Next) {
    const requestId = nanoid();
    c.set('requestId', requestId);
    c.header(REQUEST_ID_HEADER, requestId);
    await next();
  };
}

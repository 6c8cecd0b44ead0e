/**
 * Main Hono Application
 * Wires together routes and middleware
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger as requestLogger } from 'hono/logger';

import type { Logger } from '../lib/logger.js';
import type { ChatService } from '../services/index.js';

import { createAuthMiddleware } from './middleware/auth.js';
import { createRequestContextMiddleware } from './middleware/request-context.js';
import { createChatRoutes } from './routes/chat.js';
import { createHealthRoutes } from './routes/health.js';
import { errorResponse, getRequestId } from './utils/response.js';

/**
 * App configuration
 */
export interface AppConfig {
  apiKey: string;
  chatService: ChatService;
  logger: Logger;
  allowedOrigins?: string[];
}

/**
 * hono/cors matches array entries literally, so a wildcard has to be a string
 */
function toCorsOrigin(allowedOrigins: string[] | undefined): string | string[] {
  if (allowedOrigins === undefined || allowedOrigins.includes('*')) {
    return '*';
  }
  return allowedOrigins;
}

/**
 * Create the main Hono application
 */
export function createApp(config: AppConfig): Hono {
  const { apiKey, chatService, logger, allowedOrigins } = config;
  const app = new Hono();

  // Global middleware
  app.use('*', createRequestContextMiddleware());
  app.use(
    '*',
    requestLogger((message: string, ...rest: string[]) => {
      logger.info(rest.length > 0 ? `${message} ${rest.join(' ')}` : message);
    })
  );
  app.use(
    '*',
    cors({
      origin: toCorsOrigin(allowedOrigins),
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      allowHeaders: ['Authorization', 'Content-Type'],
    })
  );

  // Public routes (no auth)
  app.route('/', createHealthRoutes());

  // Protected routes
  app.use('/api/v1/chat', createAuthMiddleware({ apiKey, logger }));
  app.route('/api/v1', createChatRoutes({ chatService }));

  // 404 handler
  app.notFound((c) => {
    return errorResponse(
      c,
      { code: 'NOT_FOUND', message: 'Endpoint not found' },
      getRequestId(c)
    );
  });

  // Global error handler
  app.onError((err, c) => {
    logger.error({ error: err.message, stack: err.stack }, 'Unhandled error');
    return errorResponse(
      c,
      { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' },
      getRequestId(c)
    );
  });

  return app;
}

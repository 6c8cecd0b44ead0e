/**
 * Health Route
 * Public liveness probe
 */

import { Hono } from 'hono';

/**
 * Create health check routes
 */
export function createHealthRoutes(): Hono {
  const app = new Hono();

  /**
   * GET /health
   * No authentication, no side effects
   */
  app.get('/health', (c) => {
    return c.json({ status: 'ok' });
  });

  return app;
}

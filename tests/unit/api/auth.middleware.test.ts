/**
 * Auth Middleware Unit Tests
 * Static bearer token checked against CLAUDE_API_KEY
 */

import { Hono } from 'hono';
import { describe, it, expect, beforeEach } from 'vitest';

import { createAuthMiddleware, tokensMatch } from '@/api/middleware/auth.js';
import { makeNoopLogger } from '@/lib/logger.js';

import { TEST_API_KEY, readError } from '../../helpers/http.js';

describe('Auth Middleware', () => {
  let app: Hono;

  beforeEach(() => {
    app = new Hono();
    app.use(
      '*',
      createAuthMiddleware({ apiKey: TEST_API_KEY, logger: makeNoopLogger() })
    );
    app.get('/test', (c) => c.json({ ok: true }));
  });

  it('should return 401 when Authorization header is missing', async () => {
    const res = await app.request('/test');

    expect(res.status).toBe(401);
    const body = await readError(res);
    expect(body.error.code).toBe('UNAUTHORIZED');
    expect(body.error.message).toBe('Missing or invalid authorization header');
    expect(body.error.requestId).toBe('unknown');
  });

  it('should return 401 when Authorization header is not Bearer', async () => {
    const res = await app.request('/test', {
      headers: { Authorization: `Basic ${TEST_API_KEY}` },
    });

    expect(res.status).toBe(401);
    expect((await readError(res)).error.message).toBe(
      'Missing or invalid authorization header'
    );
  });

  it('should return 401 for an empty bearer token', async () => {
    const res = await app.request('/test', {
      headers: { Authorization: 'Bearer    ' },
    });

    expect(res.status).toBe(401);
  });

  it('should return 401 for a wrong token', async () => {
    const res = await app.request('/test', {
      headers: { Authorization: 'Bearer not-the-key' },
    });

    expect(res.status).toBe(401);
    expect((await readError(res)).error.message).toBe('Invalid API key');
  });

  it('should pass the request on with the right token', async () => {
    const res = await app.request('/test', {
      headers: { Authorization: `Bearer ${TEST_API_KEY}` },
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true });
  });
});

describe('tokensMatch', () => {
  it('should compare tokens of any length', () => {
    expect(tokensMatch('test-secret', 'test-secret')).toBe(true);
    expect(tokensMatch('test', 'test-secret')).toBe(false);
    expect(tokensMatch('', 'test-secret')).toBe(false);
  });
});

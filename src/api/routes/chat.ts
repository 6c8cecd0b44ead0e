/**
 * Chat Route
 * POST /chat runs one turn against the claude CLI
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type { ChatService } from '../../services/index.js';
import type { ChatResponseBody } from '../../types/index.js';
import { errorResponse, getRequestId } from '../utils/response.js';

/**
 * Prompt max length in characters. The prompt reaches the CLI on stdin,
 * so the argv size limit does not apply to it.
 */
export const MAX_PROMPT_LENGTH = 100_000;

const MAX_USER_ID_LENGTH = 128;
const USER_ID_MESSAGE = 'user_id must be a positive integer or a non-empty string';

const chatRequestSchema = z.object({
  prompt: z
    .string({
      required_error: 'prompt is required',
      invalid_type_error: 'prompt must be a string',
    })
    .max(MAX_PROMPT_LENGTH, `prompt must be at most ${MAX_PROMPT_LENGTH} characters`)
    .refine((value) => value.trim() !== '', 'prompt must not be empty'),
  session_id: z.string().min(1).max(256).nullish(),
  user_id: z.union(
    [
      z.number().int(USER_ID_MESSAGE).positive(USER_ID_MESSAGE),
      z
        .string()
        .trim()
        .min(1, USER_ID_MESSAGE)
        .max(MAX_USER_ID_LENGTH, `user_id must be at most ${MAX_USER_ID_LENGTH} characters`),
    ],
    { errorMap: () => ({ message: USER_ID_MESSAGE }) }
  ),
});

interface ChatRoutesDeps {
  chatService: ChatService;
}

/**
 * Create chat routes
 */
export function createChatRoutes(deps: ChatRoutesDeps): Hono {
  const { chatService } = deps;
  const app = new Hono();

  /**
   * POST /chat
   * Start a new session, or continue one with session_id
   */
  app.post('/chat', async (c) => {
    const requestId = getRequestId(c);

    let rawBody: unknown;
    try {
      rawBody = await c.req.json();
    } catch {
      return errorResponse(
        c,
        { code: 'INVALID_REQUEST', message: 'Request body must be valid JSON' },
        requestId
      );
    }

    const validation = chatRequestSchema.safeParse(rawBody);
    if (!validation.success) {
      return errorResponse(
        c,
        {
          code: 'INVALID_REQUEST',
          message: validation.error.issues[0]?.message ?? 'Invalid chat request',
          details: {
            issues: validation.error.issues.map((issue) => ({
              path: issue.path.join('.'),
              message: issue.message,
            })),
          },
        },
        requestId
      );
    }

    const body = validation.data;

    const result = await chatService.sendMessage({
      prompt: body.prompt,
      userId: body.user_id,
      ...(body.session_id !== undefined &&
        body.session_id !== null && { sessionId: body.session_id }),
    });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    const response: ChatResponseBody = {
      content: result.data.content,
      session_id: result.data.sessionId,
      cost: result.data.cost,
      duration_ms: result.data.durationMs,
    };

    return c.json(response);
  });

  return app;
}

/**
 * Chat Types
 *
 * One chat request maps to exactly one CLI invocation.
 */

import type { UserId } from './session.js';

/**
 * Validated chat request
 */
export interface SendMessageParams {
  prompt: string;
  sessionId?: string;
  userId: UserId;
}

/**
 * Chat turn result, before HTTP serialization
 */
export interface ChatReply {
  content: string;
  /** Id to send back to continue this conversation */
  sessionId: string;
  cost: number;
  durationMs: number;
}

/**
 * Wire shape of POST /api/v1/chat responses
 */
export interface ChatResponseBody {
  content: string;
  session_id: string;
  cost: number;
  duration_ms: number;
}

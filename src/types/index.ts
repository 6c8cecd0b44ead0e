/**
 * Core type definitions
 * Shared types used across the application
 */

export type { Result, Success, Failure, ErrorCode } from './result.js';
export { success, failure, isSuccess, isFailure } from './result.js';
export type {
  UserId,
  SessionState,
  RecordTurnParams,
  SessionInfo,
} from './session.js';
export type { SendMessageParams, ChatReply, ChatResponseBody } from './chat.js';
export type { InvokeParams, InvocationResult } from './cli.js';

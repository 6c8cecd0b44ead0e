/**
 * ChatService Implementation
 *
 * SCOPE: One chat turn: resolve the session, run the CLI once, record the
 * outcome in the session registry
 * NOT IN SCOPE: Authentication, request parsing, HTTP status mapping
 *
 * POLICIES:
 * - A session id the registry does not know (never seen, expired, evicted,
 *   or owned by another user_id) starts a fresh session instead of failing
 * - Exactly one CLI invocation per call, never retried
 * - CLI failures are returned as-is; SESSION_INVALID also drops the session
 */

import type { Logger } from '../lib/logger.js';
import { failure, success } from '../types/index.js';
import type {
  ChatReply,
  InvocationResult,
  InvokeParams,
  Result,
  SendMessageParams,
} from '../types/index.js';

import { sameUser } from './session.service.js';
import type { SessionService } from './session.service.js';
import type { WorkspaceService } from './workspace.service.js';

/**
 * Minimal invoker interface (subset needed by ChatService)
 */
export interface ChatServiceInvoker {
  invoke: (params: InvokeParams) => Promise<Result<InvocationResult>>;
}

/**
 * ChatService interface
 */
export interface ChatService {
  sendMessage(params: SendMessageParams): Promise<Result<ChatReply>>;
}

/**
 * Create ChatService instance
 */
export function createChatService(deps: {
  invoker: ChatServiceInvoker;
  sessionService: SessionService;
  workspaceService: WorkspaceService;
  logger: Logger;
}): ChatService {
  const { invoker, sessionService, workspaceService, logger } = deps;

  /**
   * Id to resume from, or undefined for a fresh session
   */
  async function resolveResumeId(
    params: SendMessageParams
  ): Promise<string | undefined> {
    if (params.sessionId === undefined) {
      return undefined;
    }

    const state = await sessionService.get(params.sessionId);

    if (state === null) {
      logger.info(
        { requestedSessionId: params.sessionId, userId: params.userId },
        'Unknown session id, starting a new session'
      );
      return undefined;
    }

    if (!sameUser(state.userId, params.userId)) {
      logger.warn(
        { requestedSessionId: params.sessionId, userId: params.userId },
        'Session belongs to another user, starting a new session'
      );
      return undefined;
    }

    return state.sessionId;
  }

  return {
    async sendMessage(params: SendMessageParams): Promise<Result<ChatReply>> {
      try {
        const resumeSessionId = await resolveResumeId(params);
        const workingDirectory = await workspaceService.prepare(params.userId);

        const invocation = await invoker.invoke({
          prompt: params.prompt,
          workingDirectory,
          ...(resumeSessionId !== undefined && { resumeSessionId }),
        });

        if (!invocation.success) {
          if (
            invocation.error.code === 'SESSION_INVALID' &&
            resumeSessionId !== undefined
          ) {
            const stale = await sessionService.getSessionInfo(resumeSessionId);
            logger.warn(
              {
                sessionId: resumeSessionId,
                userId: params.userId,
                messageCount: stale?.messageCount ?? 0,
                totalCost: stale?.totalCost ?? 0,
              },
              'Dropping session the claude CLI could not resume'
            );
            await sessionService.remove(resumeSessionId);
          }
          return invocation;
        }

        const { data } = invocation;
        await sessionService.recordTurn({
          sessionId: data.sessionId,
          userId: params.userId,
          cost: data.cost,
          numTurns: data.numTurns,
          toolsUsed: data.toolsUsed,
          ...(resumeSessionId !== undefined && {
            previousSessionId: resumeSessionId,
          }),
        });

        return success({
          content: data.content,
          sessionId: data.sessionId,
          cost: data.cost,
          durationMs: data.durationMs,
        });
      } catch (error) {
        logger.error(
          {
            error: error instanceof Error ? error.message : String(error),
            userId: params.userId,
          },
          'Chat turn failed unexpectedly'
        );
        return failure('INTERNAL_ERROR', 'Failed to process chat request');
      }
    },
  };
}

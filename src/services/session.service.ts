/**
 * SessionService Implementation
 *
 * SCOPE: The session registry. Maps session ids to continuation state.
 * NOT IN SCOPE: Talking to the CLI, HTTP concerns
 *
 * POLICIES:
 * - Lookups never fail: unknown, expired or evicted ids read as null
 * - Writes are last-write-wins, no versioning and no per-session locking
 * - When the CLI rotates a session id, earlier ids become aliases that
 *   resolve to the latest state
 * - Bounded: idle sessions expire after the TTL; per-user and global caps
 *   evict the least recently used session when a new one is created
 */

import type { Logger } from '../lib/logger.js';
import type { SessionConfig } from '../lib/config.js';
import type {
  RecordTurnParams,
  SessionInfo,
  SessionState,
  UserId,
} from '../types/index.js';

import type { SessionStore } from './session.store.js';

/**
 * SessionService interface
 */
export interface SessionService {
  get(sessionId: string): Promise<SessionState | null>;
  put(state: SessionState): Promise<void>;
  recordTurn(params: RecordTurnParams): Promise<SessionState>;
  remove(sessionId: string): Promise<void>;
  cleanupExpired(): Promise<number>;
  listUserSessions(userId: UserId): Promise<SessionInfo[]>;
  getSessionInfo(sessionId: string): Promise<SessionInfo | null>;
}

// ─────────────────────────────────────────────────────────────
// HELPER FUNCTIONS
// ─────────────────────────────────────────────────────────────

export function sameUser(a: UserId, b: UserId): boolean {
  return String(a) === String(b);
}

function byLastSeen(a: SessionState, b: SessionState): number {
  return a.lastSeenAt.getTime() - b.lastSeenAt.getTime();
}

function mergeTools(existing: string[], added: string[]): string[] {
  return [...new Set([...existing, ...added])];
}

// ─────────────────────────────────────────────────────────────
// SERVICE IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

/**
 * Create SessionService instance
 */
export function createSessionService(deps: {
  store: SessionStore;
  config: SessionConfig;
  logger: Logger;
  now?: () => Date;
}): SessionService {
  const { store, config, logger } = deps;
  const now = deps.now ?? (() => new Date());
  // retired id -> current id
  const aliases = new Map<string, string>();

  function isExpired(state: SessionState): boolean {
    return now().getTime() - state.lastSeenAt.getTime() > config.ttlMs;
  }

  function toInfo(state: SessionState): SessionInfo {
    return {
      sessionId: state.sessionId,
      userId: state.userId,
      createdAt: state.createdAt.toISOString(),
      lastSeenAt: state.lastSeenAt.toISOString(),
      totalCost: state.totalCost,
      totalTurns: state.totalTurns,
      messageCount: state.messageCount,
      toolsUsed: [...state.toolsUsed],
      expired: isExpired(state),
    };
  }

  async function removeState(state: SessionState): Promise<void> {
    await store.delete(state.sessionId);
    for (const previousId of state.previousSessionIds) {
      aliases.delete(previousId);
    }
  }

  async function cleanupExpired(): Promise<number> {
    const expired = (await store.list()).filter(isExpired);
    for (const state of expired) {
      await removeState(state);
    }
    if (expired.length > 0) {
      logger.info({ expiredSessions: expired.length }, 'Expired sessions removed');
    }
    return expired.length;
  }

  /**
   * Make room for one more session owned by userId
   */
  async function enforceLimits(userId: UserId): Promise<void> {
    await cleanupExpired();

    const all = (await store.list()).sort(byLastSeen);
    const evicted = new Set<string>();

    const evict = async (state: SessionState, reason: string): Promise<void> => {
      await removeState(state);
      evicted.add(state.sessionId);
      logger.info(
        { sessionId: state.sessionId, userId: state.userId, reason },
        'Session evicted'
      );
    };

    const userSessions = all.filter((state) => sameUser(state.userId, userId));
    for (const state of userSessions) {
      if (userSessions.length - evicted.size < config.maxSessionsPerUser) {
        break;
      }
      await evict(state, 'per-user limit');
    }

    for (const state of all) {
      if (all.length - evicted.size < config.maxSessions) {
        break;
      }
      if (!evicted.has(state.sessionId)) {
        await evict(state, 'global limit');
      }
    }
  }

  async function listUserSessions(userId: UserId): Promise<SessionInfo[]> {
    return (await store.list())
      .filter((state) => sameUser(state.userId, userId))
      .sort(byLastSeen)
      .map(toInfo);
  }

  async function get(sessionId: string): Promise<SessionState | null> {
    const currentId = aliases.get(sessionId) ?? sessionId;
    const state = await store.get(currentId);

    if (state === null) {
      aliases.delete(sessionId);
      return null;
    }

    if (isExpired(state)) {
      await removeState(state);
      logger.debug({ sessionId: state.sessionId }, 'Session expired on access');
      return null;
    }

    return state;
  }

  async function put(state: SessionState): Promise<void> {
    const isNew = (await store.get(state.sessionId)) === null;
    if (isNew) {
      await enforceLimits(state.userId);
    }
    aliases.delete(state.sessionId);
    await store.save(state);
  }

  return {
    get,
    put,

    /**
     * Record a completed turn: create the session, or update it and follow
     * the CLI to a rotated id
     */
    async recordTurn(params: RecordTurnParams): Promise<SessionState> {
      const timestamp = now();
      const existing =
        (params.previousSessionId !== undefined
          ? await get(params.previousSessionId)
          : null) ?? (await get(params.sessionId));

      if (existing === null) {
        const created: SessionState = {
          sessionId: params.sessionId,
          userId: params.userId,
          createdAt: timestamp,
          lastSeenAt: timestamp,
          totalCost: params.cost,
          totalTurns: params.numTurns,
          messageCount: 1,
          toolsUsed: mergeTools([], params.toolsUsed),
          previousSessionIds: [],
        };
        await put(created);
        logger.info(
          {
            sessionId: created.sessionId,
            userId: created.userId,
            userSessions: (await listUserSessions(created.userId)).length,
            activeSessions: await store.count(),
          },
          'Session created'
        );
        return created;
      }

      const rotated = existing.sessionId !== params.sessionId;
      const updated: SessionState = {
        ...existing,
        sessionId: params.sessionId,
        lastSeenAt: timestamp,
        totalCost: existing.totalCost + params.cost,
        totalTurns: existing.totalTurns + params.numTurns,
        messageCount: existing.messageCount + 1,
        toolsUsed: mergeTools(existing.toolsUsed, params.toolsUsed),
        previousSessionIds: rotated
          ? [...existing.previousSessionIds, existing.sessionId]
          : existing.previousSessionIds,
      };

      if (rotated) {
        await store.delete(existing.sessionId);
        for (const previousId of updated.previousSessionIds) {
          aliases.set(previousId, updated.sessionId);
        }
        logger.info(
          {
            previousSessionId: existing.sessionId,
            sessionId: updated.sessionId,
          },
          'Session id rotated'
        );
      }

      aliases.delete(updated.sessionId);
      await store.save(updated);
      return updated;
    },

    async remove(sessionId: string): Promise<void> {
      const currentId = aliases.get(sessionId) ?? sessionId;
      aliases.delete(sessionId);
      const state = await store.get(currentId);
      if (state !== null) {
        await removeState(state);
        logger.info({ sessionId: state.sessionId }, 'Session removed');
      }
    },

    cleanupExpired,

    listUserSessions,

    async getSessionInfo(sessionId: string): Promise<SessionInfo | null> {
      const state = await store.get(aliases.get(sessionId) ?? sessionId);
      return state === null ? null : toInfo(state);
    },
  };
}

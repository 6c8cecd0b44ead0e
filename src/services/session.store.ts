/**
 * Session Storage
 *
 * Storage abstraction for SessionService. The in-memory store lives as long
 * as the process does; nothing survives a restart.
 */

import type { SessionState } from '../types/index.js';

/**
 * Storage interface for session state, keyed by the current session id
 */
export interface SessionStore {
  get: (sessionId: string) => Promise<SessionState | null>;
  save: (state: SessionState) => Promise<void>;
  delete: (sessionId: string) => Promise<void>;
  list: () => Promise<SessionState[]>;
  count: () => Promise<number>;
}

/**
 * Create a Map-backed session store
 *
 * States are copied on the way in and out, so callers never hold a
 * reference into the store.
 */
export function createInMemorySessionStore(): SessionStore {
  const sessions = new Map<string, SessionState>();

  const copy = (state: SessionState): SessionState => ({
    ...state,
    createdAt: new Date(state.createdAt),
    lastSeenAt: new Date(state.lastSeenAt),
    toolsUsed: [...state.toolsUsed],
    previousSessionIds: [...state.previousSessionIds],
  });

  return {
    async get(sessionId: string): Promise<SessionState | null> {
      const state = sessions.get(sessionId);
      return state === undefined ? null : copy(state);
    },

    async save(state: SessionState): Promise<void> {
      sessions.set(state.sessionId, copy(state));
    },

    async delete(sessionId: string): Promise<void> {
      sessions.delete(sessionId);
    },

    async list(): Promise<SessionState[]> {
      return [...sessions.values()].map(copy);
    },

    async count(): Promise<number> {
      return sessions.size;
    },
  };
}

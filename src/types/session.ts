/**
 * Session Types
 *
 * A session is the continuation context the CLI hands back after each turn.
 * The id is minted by the CLI; this service only remembers the latest one.
 */

/**
 * Caller-supplied user id. Passed through opaquely, never verified.
 */
export type UserId = number | string;

/**
 * Continuation state for one conversation
 */
export interface SessionState {
  sessionId: string;
  userId: UserId;
  createdAt: Date;
  lastSeenAt: Date;
  totalCost: number;
  totalTurns: number;
  messageCount: number;
  toolsUsed: string[];
  /** Ids the CLI used for this conversation before it rotated them */
  previousSessionIds: string[];
}

/**
 * Parameters for recording a completed turn
 */
export interface RecordTurnParams {
  /** Id the turn resumed from, absent for a fresh session */
  previousSessionId?: string;
  /** Id reported by the CLI for this turn */
  sessionId: string;
  userId: UserId;
  cost: number;
  numTurns: number;
  toolsUsed: string[];
}

/**
 * Read-only view of a session for logging and inspection
 */
export interface SessionInfo {
  sessionId: string;
  userId: UserId;
  createdAt: string;
  lastSeenAt: string;
  totalCost: number;
  totalTurns: number;
  messageCount: number;
  toolsUsed: string[];
  expired: boolean;
}

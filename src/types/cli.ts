/**
 * CLI Invocation Types
 */

/**
 * Input for a single CLI run
 */
export interface InvokeParams {
  prompt: string;
  /** Session to continue; a fresh session is started when absent */
  resumeSessionId?: string;
  workingDirectory: string;
}

/**
 * Typed result of a CLI run. Nothing untyped crosses the invoker boundary.
 */
export interface InvocationResult {
  content: string;
  sessionId: string;
  cost: number;
  durationMs: number;
  numTurns: number;
  /** The CLI stopped because it hit --max-turns */
  maxTurnsReached: boolean;
  /** Unique tool names the CLI used during the run */
  toolsUsed: string[];
}

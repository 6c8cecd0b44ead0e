/**
 * CLI Failure Classification
 *
 * Maps the CLI's diagnostic text onto error codes an operator can act on.
 * First matching rule wins.
 */

import { AUTH_INSTRUCTIONS } from '../lib/credentials.js';
import { failure } from '../types/index.js';
import type { Failure } from '../types/index.js';

const AUTH_PHRASES = [
  'not authenticated',
  'authentication failed',
  'setup-token',
  'no valid token found',
  'invalid api key',
  'please run /login',
];

const SESSION_PHRASES = [
  'session not found',
  'invalid session',
  'session expired',
  'could not resume',
  'no conversation found',
];

const USAGE_LIMIT_PHRASE = 'usage limit reached';

/** e.g. "resets at 5pm (Europe/Berlin)" or "reset at 10am" */
const RESET_TIME_PATTERN = /resets? at (\d{1,2}(?::\d{2})?\s*[ap]m)/i;
const RESET_ZONE_PATTERN = /resets? at [^(]*\(([^)]+)\)/i;

/**
 * Cap on diagnostic text copied into error details
 */
export const MAX_DIAGNOSTIC_LENGTH = 4000;

export function truncateDiagnostic(text: string): string {
  const trimmed = text.trim();
  if (trimmed.length <= MAX_DIAGNOSTIC_LENGTH) {
    return trimmed;
  }
  return `${trimmed.slice(0, MAX_DIAGNOSTIC_LENGTH)}…`;
}

function includesAny(haystack: string, needles: string[]): boolean {
  return needles.some((needle) => haystack.includes(needle));
}

/**
 * Classify a known failure mode, or return null when the text matches none
 */
export function classifyCliFailure(diagnostic: string): Failure | null {
  const lower = diagnostic.toLowerCase();
  const text = truncateDiagnostic(diagnostic);

  if (includesAny(lower, AUTH_PHRASES)) {
    return failure(
      'AUTHENTICATION_REQUIRED',
      'The claude CLI is not authenticated on this server',
      { instructions: AUTH_INSTRUCTIONS, diagnostic: text }
    );
  }

  if (lower.includes(USAGE_LIMIT_PHRASE)) {
    const resetTime = RESET_TIME_PATTERN.exec(diagnostic)?.[1];
    const timezone = RESET_ZONE_PATTERN.exec(diagnostic)?.[1];
    const resetAt =
      resetTime === undefined
        ? 'later'
        : timezone === undefined
          ? resetTime
          : `${resetTime} (${timezone})`;

    return failure(
      'USAGE_LIMIT_REACHED',
      `The claude CLI usage limit was reached; it resets at ${resetAt}`,
      { resetAt, diagnostic: text }
    );
  }

  if (includesAny(lower, SESSION_PHRASES)) {
    return failure(
      'SESSION_INVALID',
      'The claude CLI could not resume this session; send the next message without session_id to start a new one',
      { diagnostic: text }
    );
  }

  return null;
}

/**
 * Pino Logger Factory
 * JSON to stdout, silenced under Vitest
 */

import { pino } from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

export const LOG_LEVELS = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const REDACT_PATHS = [
  'apiKey',
  'token',
  'authorization',
  'headers.authorization',
  'req.headers.authorization',
];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Level from LOG_LEVEL, or info when it is unset or not a pino level.
 * An invalid value is reported by loadConfig, not here.
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return normalized !== undefined && isLogLevel(normalized) ? normalized : 'info';
}

/**
 * Create a logger carrying the given bindings on every line
 *
 * Without an explicit level it falls back to LOG_LEVEL, so it is safe to
 * call at module scope before configuration has been validated.
 */
export function makeLogger(
  bindings?: Record<string, unknown>,
  level: LogLevel = resolveLogLevel(process.env.LOG_LEVEL)
): Logger {
  const isTest =
    process.env.VITEST === 'true' || process.env.NODE_ENV === 'test';

  return pino({
    level,
    enabled: !isTest,
    base: { ...bindings, service: 'claude-cli-gateway' },
    messageKey: 'msg',
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
  });
}

/**
 * Silent logger for tests
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}

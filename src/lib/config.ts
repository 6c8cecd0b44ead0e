/**
 * Application Configuration
 * Reads and validates environment variables once at startup
 */

import { homedir, tmpdir } from 'node:os';
import { join } from 'node:path';

import { z } from 'zod';

import { LOG_LEVELS } from './logger.js';
import type { LogLevel } from './logger.js';

/**
 * Boolean env var: "true"/"1"/"yes" and "false"/"0"/"no", case-insensitive
 */
const envBoolean = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === '') {
        return fallback;
      }
      const normalized = value.trim().toLowerCase();
      if (['true', '1', 'yes'].includes(normalized)) {
        return true;
      }
      if (['false', '0', 'no'].includes(normalized)) {
        return false;
      }
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected a boolean, received "${value}"`,
      });
      return z.NEVER;
    });

/**
 * Comma-separated list; empty entries are dropped
 */
const envList = z
  .string()
  .optional()
  .transform((value) =>
    value === undefined
      ? []
      : value
          .split(',')
          .map((item) => item.trim())
          .filter((item) => item !== '')
  );

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  CLAUDE_API_KEY: z
    .string({ required_error: 'CLAUDE_API_KEY is required' })
    .min(1, 'CLAUDE_API_KEY must not be empty'),
  CLAUDE_BINARY_PATH: z.string().min(1).default('claude'),
  CLAUDE_TIMEOUT_SECONDS: positiveInt(300),
  CLAUDE_MAX_TURNS: positiveInt(50),
  CLAUDE_ALLOWED_TOOLS: envList,
  CLAUDE_SKIP_PERMISSIONS: envBoolean(true),
  CLAUDE_KILL_GRACE_MS: z.coerce.number().int().nonnegative().default(5000),
  CLAUDE_WORKSPACE_ROOT: z.string().min(1).optional(),
  CLAUDE_SESSION_TIMEOUT_HOURS: z.coerce.number().positive().default(24),
  CLAUDE_MAX_SESSIONS_PER_USER: positiveInt(10),
  CLAUDE_MAX_SESSIONS: positiveInt(1000),
  CORS_ORIGINS: envList,
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.preprocess(
    (value) =>
      typeof value === 'string' && value.trim() !== ''
        ? value.trim().toLowerCase()
        : undefined,
    z.enum(LOG_LEVELS).default('info')
  ),
  HOME: z.string().optional(),
});

/**
 * CLI invocation settings
 */
export interface CliConfig {
  binaryPath: string;
  timeoutMs: number;
  maxTurns: number;
  allowedTools: string[];
  skipPermissions: boolean;
  killGraceMs: number;
}

/**
 * Session registry bounds
 */
export interface SessionConfig {
  ttlMs: number;
  maxSessionsPerUser: number;
  maxSessions: number;
}

export interface AppConfig {
  apiKey: string;
  cli: CliConfig;
  sessions: SessionConfig;
  workspaceRoot: string;
  credentialsPath: string;
  corsOrigins: string[];
  port: number;
  host: string;
  logLevel: LogLevel;
}

/**
 * Thrown when the environment does not describe a runnable service
 */
export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Build the application config from environment variables
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`
      )
    );
  }

  const vars = parsed.data;
  const home = vars.HOME ?? homedir();

  return {
    apiKey: vars.CLAUDE_API_KEY,
    cli: {
      binaryPath: vars.CLAUDE_BINARY_PATH,
      timeoutMs: vars.CLAUDE_TIMEOUT_SECONDS * 1000,
      maxTurns: vars.CLAUDE_MAX_TURNS,
      allowedTools: vars.CLAUDE_ALLOWED_TOOLS,
      skipPermissions: vars.CLAUDE_SKIP_PERMISSIONS,
      killGraceMs: vars.CLAUDE_KILL_GRACE_MS,
    },
    sessions: {
      ttlMs: vars.CLAUDE_SESSION_TIMEOUT_HOURS * 60 * 60 * 1000,
      maxSessionsPerUser: vars.CLAUDE_MAX_SESSIONS_PER_USER,
      maxSessions: vars.CLAUDE_MAX_SESSIONS,
    },
    workspaceRoot: vars.CLAUDE_WORKSPACE_ROOT ?? tmpdir(),
    credentialsPath: join(home, '.claude', '.credentials.json'),
    corsOrigins: vars.CORS_ORIGINS.length > 0 ? vars.CORS_ORIGINS : ['*'],
    port: vars.PORT,
    host: vars.HOST,
    logLevel: vars.LOG_LEVEL,
  };
}

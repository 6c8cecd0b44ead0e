/**
 * Shared Library Exports
 */

export {
  LOG_LEVELS,
  makeLogger,
  makeNoopLogger,
  resolveLogLevel,
} from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export { loadConfig, ConfigError } from './config.js';
export type { AppConfig, CliConfig, SessionConfig } from './config.js';
export { checkCliCredentials, AUTH_INSTRUCTIONS } from './credentials.js';
export type { CredentialStatus, CredentialSource } from './credentials.js';

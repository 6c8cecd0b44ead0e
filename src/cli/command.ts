/**
 * CLI Command Builder
 */

import type { CliConfig } from '../lib/config.js';
import type { InvokeParams } from '../types/index.js';

/**
 * Build the argv (without the binary) for one print-mode run.
 * The prompt is not part of argv: it goes to the process on stdin, so it
 * is never parsed as an option and is not bound by the argv size limit.
 * stream-json requires --verbose in print mode.
 */
export function buildCliArgs(
  config: CliConfig,
  params: Pick<InvokeParams, 'resumeSessionId'>
): string[] {
  const args: string[] = [];

  if (params.resumeSessionId !== undefined) {
    args.push('--resume', params.resumeSessionId);
  }

  args.push(
    '-p',
    '--output-format',
    'stream-json',
    '--verbose',
    '--max-turns',
    String(config.maxTurns)
  );

  if (config.allowedTools.length > 0) {
    args.push('--allowedTools', config.allowedTools.join(','));
  }

  if (config.skipPermissions) {
    args.push('--dangerously-skip-permissions');
  }

  return args;
}

/**
 * Environment for the CLI process: the base env plus the project directory
 */
export function buildCliEnv(
  baseEnv: NodeJS.ProcessEnv,
  workingDirectory: string
): NodeJS.ProcessEnv {
  return {
    ...baseEnv,
    CLAUDE_PROJECT_DIR: workingDirectory,
    CLAUDE_BASH_MAINTAIN_PROJECT_WORKING_DIR: 'true',
  };
}

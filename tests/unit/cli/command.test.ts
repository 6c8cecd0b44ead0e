/**
 * CLI Command Builder Unit Tests
 */

import { describe, expect, it } from 'vitest';

import { buildCliArgs, buildCliEnv } from '@/cli/command.js';
import type { CliConfig } from '@/lib/config.js';
import type { InvokeParams } from '@/types/index.js';

const config: CliConfig = {
  binaryPath: 'claude',
  timeoutMs: 300_000,
  maxTurns: 50,
  allowedTools: [],
  skipPermissions: true,
  killGraceMs: 5000,
};

describe('buildCliArgs', () => {
  it('should build a fresh-session command', () => {
    expect(buildCliArgs(config, {})).toEqual([
      '-p',
      '--output-format',
      'stream-json',
      '--verbose',
      '--max-turns',
      '50',
      '--dangerously-skip-permissions',
    ]);
  });

  it('should put --resume first when continuing a session', () => {
    const args = buildCliArgs(config, { resumeSessionId: 'sess-1' });

    expect(args.slice(0, 3)).toEqual(['--resume', 'sess-1', '-p']);
  });

  it('should keep an option-like prompt out of argv', () => {
    const params: InvokeParams = {
      prompt: '--mcp-config=/tmp/evil.json --allowedTools=Bash',
      workingDirectory: '/tmp/claude_user_1',
    };

    const args = buildCliArgs(config, params);

    expect(args).toEqual(buildCliArgs(config, {}));
    expect(args.some((arg) => arg.startsWith('--mcp-config'))).toBe(false);
  });

  it('should add allowed tools and drop the permission bypass', () => {
    const args = buildCliArgs(
      { ...config, allowedTools: ['Read', 'Grep'], skipPermissions: false },
      {}
    );

    expect(args.slice(-2)).toEqual(['--allowedTools', 'Read,Grep']);
    expect(args).not.toContain('--dangerously-skip-permissions');
  });
});

describe('buildCliEnv', () => {
  it('should keep the base env and pin the project directory', () => {
    const env = buildCliEnv({ PATH: '/usr/bin' }, '/tmp/claude_user_1');

    expect(env).toEqual({
      PATH: '/usr/bin',
      CLAUDE_PROJECT_DIR: '/tmp/claude_user_1',
      CLAUDE_BASH_MAINTAIN_PROJECT_WORKING_DIR: 'true',
    });
  });
});

/**
 * CLI Process Integration Tests
 *
 * The invoker with its real spawn against a shell script that never
 * finishes, so termination is checked on an actual child process.
 */

import { chmod } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { fileURLToPath } from 'node:url';

import { describe, it, expect, beforeAll } from 'vitest';

import { createCliInvoker, spawnCliProcess } from '@/cli/invoker.js';
import type { SpawnFn } from '@/cli/types.js';
import type { CliConfig } from '@/lib/config.js';
import { makeNoopLogger } from '@/lib/logger.js';

const SLOW_CLI = fileURLToPath(
  new URL('../fixtures/slow-cli.sh', import.meta.url)
);

const config: CliConfig = {
  binaryPath: SLOW_CLI,
  timeoutMs: 300,
  maxTurns: 50,
  allowedTools: [],
  skipPermissions: true,
  killGraceMs: 500,
};

function isRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

describe('CLI process lifecycle', () => {
  beforeAll(async () => {
    await chmod(SLOW_CLI, 0o755);
  });

  it('should terminate a real process that exceeds the timeout', async () => {
    const pids: number[] = [];
    const spawn: SpawnFn = (command, args, options) => {
      const child = spawnCliProcess(command, args, options);
      if (child.pid !== undefined) {
        pids.push(child.pid);
      }
      return child;
    };
    const invoker = createCliInvoker({
      config,
      logger: makeNoopLogger(),
      spawn,
    });

    const result = await invoker.invoke({
      prompt: 'Take forever',
      workingDirectory: tmpdir(),
    });

    expect(!result.success && result.error.code).toBe('TIMEOUT');
    expect(pids).toHaveLength(1);
    for (const pid of pids) {
      expect(isRunning(pid)).toBe(false);
    }
    expect(invoker.getActiveCount()).toBe(0);
  });
});

/**
 * CLI Invoker
 *
 * One chat turn = one `claude -p` process, with the prompt written to its
 * stdin. The process is bounded by the configured timeout; on expiry (or
 * shutdown) it receives SIGTERM, then SIGKILL after the grace period. The call settles only once the process
 * has exited, and every timer, listener and pipe is released on the way out.
 */

import { spawn as nodeSpawn } from 'node:child_process';
import { createInterface } from 'node:readline';

import { nanoid } from 'nanoid';

import { failure } from '../types/index.js';
import type { InvocationResult, InvokeParams, Result } from '../types/index.js';

import { buildCliArgs, buildCliEnv } from './command.js';
import { buildInvocationResult, createStreamParser } from './output-parser.js';
import type { ParsedStream } from './output-parser.js';
import type {
  CliInvoker,
  CliProcess,
  CreateCliInvokerDeps,
  SpawnFn,
} from './types.js';

/**
 * stderr kept for diagnostics
 */
const MAX_STDERR_LENGTH = 64 * 1024;

type TerminationReason = 'timeout' | 'shutdown';

interface RunOutcome {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  parsed: ParsedStream;
  stderr: string;
  termination?: TerminationReason;
  spawnError?: Error;
  /** Writing the prompt failed, e.g. EPIPE when the CLI exits early */
  stdinError?: Error;
}

interface ActiveInvocation {
  controller: AbortController;
  done: Promise<RunOutcome>;
}

/**
 * Spawn with every stdio stream piped: the prompt goes in on stdin
 */
export const spawnCliProcess: SpawnFn = (command, args, options) =>
  nodeSpawn(command, args, {
    cwd: options.cwd,
    env: options.env,
    stdio: ['pipe', 'pipe', 'pipe'],
  });

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;
}

/**
 * Wait for a spawned CLI process to finish, enforcing the timeout
 */
function runToCompletion(
  child: CliProcess,
  options: {
    input: string;
    timeoutMs: number;
    killGraceMs: number;
    signal: AbortSignal;
  }
): Promise<RunOutcome> {
  return new Promise((resolve) => {
    const parser = createStreamParser();
    let stderr = '';
    let settled = false;
    let termination: TerminationReason | undefined;
    let spawnError: Error | undefined;
    let stdinError: Error | undefined;
    let exitInfo:
      | { code: number | null; signal: NodeJS.Signals | null }
      | undefined;
    let killTimer: NodeJS.Timeout | undefined;

    const lines =
      child.stdout === null
        ? undefined
        : createInterface({ input: child.stdout, crlfDelay: Infinity });
    lines?.on('line', (line: string) => parser.pushLine(line));

    const onStderr = (chunk: Buffer | string): void => {
      if (stderr.length < MAX_STDERR_LENGTH) {
        stderr = (stderr + chunk.toString()).slice(0, MAX_STDERR_LENGTH);
      }
    };
    child.stderr?.on('data', onStderr);

    const finish = (
      code: number | null,
      exitSignal: NodeJS.Signals | null
    ): void => {
      if (settled) {
        return;
      }
      settled = true;

      clearTimeout(timeoutTimer);
      if (killTimer !== undefined) {
        clearTimeout(killTimer);
      }
      options.signal.removeEventListener('abort', onAbort);
      child.stderr?.off('data', onStderr);
      lines?.close();
      child.stdin?.destroy();
      child.stdout?.destroy();
      child.stderr?.destroy();

      const outcome: RunOutcome = {
        exitCode: code,
        signal: exitSignal,
        parsed: parser.finish(),
        stderr,
      };
      if (termination !== undefined) {
        outcome.termination = termination;
      }
      if (spawnError !== undefined) {
        outcome.spawnError = spawnError;
      }
      if (stdinError !== undefined) {
        outcome.stdinError = stdinError;
      }
      resolve(outcome);
    };

    const terminate = (reason: TerminationReason): void => {
      if (settled || termination !== undefined) {
        return;
      }
      termination = reason;

      // Already gone, only the pipes are still open (e.g. held by a grandchild)
      if (exitInfo !== undefined) {
        finish(exitInfo.code, exitInfo.signal);
        return;
      }

      child.kill('SIGTERM');
      killTimer = setTimeout(() => {
        if (!settled) {
          child.kill('SIGKILL');
        }
      }, options.killGraceMs);
    };

    const onAbort = (): void => terminate('shutdown');
    const timeoutTimer = setTimeout(
      () => terminate('timeout'),
      options.timeoutMs
    );

    if (options.signal.aborted) {
      terminate('shutdown');
    } else {
      options.signal.addEventListener('abort', onAbort, { once: true });
    }

    // Stays attached until the end: an EPIPE may arrive after finish()
    child.stdin?.on('error', (error: Error) => {
      if (stdinError === undefined) {
        stdinError = error;
      }
    });
    child.stdin?.end(options.input, 'utf8');

    child.once('error', (error: Error) => {
      spawnError = error;
      // No pid means the process never started; no exit/close will follow
      if (child.pid === undefined) {
        finish(null, null);
      }
    });

    child.once(
      'exit',
      (code: number | null, exitSignal: NodeJS.Signals | null) => {
        exitInfo = { code, signal: exitSignal };
        if (termination !== undefined) {
          finish(code, exitSignal);
        }
      }
    );

    child.once(
      'close',
      (code: number | null, exitSignal: NodeJS.Signals | null) => {
        finish(code, exitSignal);
      }
    );
  });
}

/**
 * Create a CLI invoker
 */
export function createCliInvoker(deps: CreateCliInvokerDeps): CliInvoker {
  const { config, logger } = deps;
  const spawn = deps.spawn ?? spawnCliProcess;
  const baseEnv = deps.env ?? process.env;
  const active = new Map<string, ActiveInvocation>();
  const timeoutSeconds = Math.round(config.timeoutMs / 1000);

  return {
    async invoke(params: InvokeParams): Promise<Result<InvocationResult>> {
      const invocationId = nanoid();
      const startedAt = Date.now();
      const log = logger.child({
        invocationId,
        resumeSessionId: params.resumeSessionId ?? null,
      });

      log.info(
        {
          workingDirectory: params.workingDirectory,
          promptLength: params.prompt.length,
        },
        'Starting claude CLI'
      );

      let child: CliProcess;
      try {
        child = spawn(config.binaryPath, buildCliArgs(config, params), {
          cwd: params.workingDirectory,
          env: buildCliEnv(baseEnv, params.workingDirectory),
        });
      } catch (error) {
        log.error({ error: errorMessage(error) }, 'Failed to spawn claude CLI');
        return failure(
          'EXECUTION_FAILED',
          `Failed to start claude CLI: ${errorMessage(error)}`,
          { binaryPath: config.binaryPath }
        );
      }

      const controller = new AbortController();
      const done = runToCompletion(child, {
        input: params.prompt,
        timeoutMs: config.timeoutMs,
        killGraceMs: config.killGraceMs,
        signal: controller.signal,
      });
      active.set(invocationId, { controller, done });

      let outcome: RunOutcome;
      try {
        outcome = await done;
      } finally {
        active.delete(invocationId);
      }

      const elapsedMs = Date.now() - startedAt;

      if (outcome.termination === 'timeout') {
        log.error(
          { timeoutSeconds, exitSignal: outcome.signal },
          'claude CLI timed out and was terminated'
        );
        return failure(
          'TIMEOUT',
          `claude CLI timed out after ${timeoutSeconds}s`,
          { timeoutSeconds }
        );
      }

      if (outcome.termination === 'shutdown') {
        log.warn('claude CLI stopped for shutdown');
        return failure(
          'EXECUTION_FAILED',
          'claude CLI was stopped because the service is shutting down'
        );
      }

      if (outcome.spawnError !== undefined && outcome.exitCode === null) {
        const code = errorCode(outcome.spawnError);
        log.error(
          { error: outcome.spawnError.message, code },
          'claude CLI could not be started'
        );
        return failure(
          'EXECUTION_FAILED',
          code === 'ENOENT'
            ? `claude CLI binary not found: ${config.binaryPath}`
            : `Failed to start claude CLI: ${outcome.spawnError.message}`,
          { binaryPath: config.binaryPath, ...(code !== undefined && { code }) }
        );
      }

      if (outcome.stdinError !== undefined) {
        log.warn(
          { error: outcome.stdinError.message },
          'claude CLI did not read the whole prompt'
        );
      }

      if (outcome.parsed.skippedLines > 0) {
        log.warn(
          { skippedLines: outcome.parsed.skippedLines },
          'Skipped non-JSON lines in claude CLI output'
        );
      }

      const result = buildInvocationResult(outcome.parsed, {
        exitCode: outcome.exitCode,
        signal: outcome.signal,
        stderr: outcome.stderr,
        elapsedMs,
        ...(params.resumeSessionId !== undefined && {
          resumeSessionId: params.resumeSessionId,
        }),
      });

      if (!result.success) {
        log.error(
          {
            code: result.error.code,
            exitCode: outcome.exitCode,
            details: result.error.details,
          },
          result.error.message
        );
        return result;
      }

      if (result.data.maxTurnsReached) {
        log.warn(
          { maxTurns: config.maxTurns, sessionId: result.data.sessionId },
          'claude CLI stopped at the turn limit'
        );
      }

      log.info(
        {
          sessionId: result.data.sessionId,
          cost: result.data.cost,
          durationMs: result.data.durationMs,
          numTurns: result.data.numTurns,
        },
        'claude CLI completed'
      );

      return result;
    },

    async killAll(): Promise<void> {
      const running = [...active.values()];
      if (running.length === 0) {
        return;
      }

      logger.info({ count: running.length }, 'Terminating active claude CLI processes');
      for (const invocation of running) {
        invocation.controller.abort();
      }
      await Promise.allSettled(running.map((invocation) => invocation.done));
    },

    getActiveCount(): number {
      return active.size;
    },
  };
}

/**
 * CLI Invoker Types
 *
 * SCOPE: Spawning the claude CLI and turning its output into typed results
 * NOT IN SCOPE: Session bookkeeping, HTTP concerns
 */

import type { EventEmitter } from 'node:events';
import type { Readable, Writable } from 'node:stream';

import type { Logger } from '../lib/logger.js';
import type { CliConfig } from '../lib/config.js';
import type { InvocationResult, InvokeParams, Result } from '../types/index.js';

/**
 * The parts of a child process the invoker relies on.
 * Node's ChildProcess satisfies this; tests supply an in-process fake.
 * The prompt is written to stdin, the stream-json output read from stdout.
 *
 * Events: 'close' (code, signal), 'error' (err)
 */
export interface CliProcess extends EventEmitter {
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly pid?: number | undefined;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export interface SpawnOptions {
  cwd: string;
  env: NodeJS.ProcessEnv;
}

/**
 * Process factory signature (argv array, never a shell string)
 */
export type SpawnFn = (
  command: string,
  args: string[],
  options: SpawnOptions
) => CliProcess;

/**
 * Dependencies for creating a CLI invoker
 */
export interface CreateCliInvokerDeps {
  config: CliConfig;
  logger: Logger;
  /** Defaults to child_process.spawn with piped stdio */
  spawn?: SpawnFn;
  /** Base environment for the CLI, defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

/**
 * Runs one CLI process per call
 */
export interface CliInvoker {
  invoke(params: InvokeParams): Promise<Result<InvocationResult>>;
  /** Terminate every running invocation (used on shutdown) */
  killAll(): Promise<void>;
  getActiveCount(): number;
}

/**
 * CLI Invoker Exports
 */

export { createCliInvoker, spawnCliProcess } from './invoker.js';
export { buildCliArgs, buildCliEnv } from './command.js';
export {
  createStreamParser,
  buildInvocationResult,
  resultMessageSchema,
} from './output-parser.js';
export type {
  ParsedStream,
  ProcessOutcome,
  ResultMessage,
  StreamParser,
} from './output-parser.js';
export { classifyCliFailure, truncateDiagnostic } from './errors.js';
export type {
  CliInvoker,
  CliProcess,
  CreateCliInvokerDeps,
  SpawnFn,
  SpawnOptions,
} from './types.js';

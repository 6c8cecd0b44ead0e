/**
 * Stream-JSON Output Parser
 *
 * The CLI prints one JSON object per line. Lines are untyped at this
 * boundary; only schema-checked values make it into InvocationResult.
 */

import { z } from 'zod';

import { failure, success } from '../types/index.js';
import type { InvocationResult, Result } from '../types/index.js';

import { classifyCliFailure, truncateDiagnostic } from './errors.js';

const MAX_TURNS_SUBTYPE = 'error_max_turns';

const lineSchema = z.object({ type: z.string() }).passthrough();

const initMessageSchema = z.object({
  type: z.literal('system'),
  subtype: z.literal('init'),
  session_id: z.string().min(1),
});

const assistantMessageSchema = z.object({
  type: z.literal('assistant'),
  message: z.object({
    content: z.array(
      z.object({ type: z.string(), name: z.string().optional() }).passthrough()
    ),
  }),
});

export const resultMessageSchema = z.object({
  type: z.literal('result'),
  subtype: z.string().optional(),
  is_error: z.boolean().default(false),
  result: z.string().optional(),
  session_id: z.string().optional(),
  total_cost_usd: z.number().nonnegative().optional(),
  cost_usd: z.number().nonnegative().optional(),
  duration_ms: z.number().nonnegative().optional(),
  num_turns: z.number().int().nonnegative().optional(),
});

export type ResultMessage = z.infer<typeof resultMessageSchema>;

/**
 * Everything gathered from stdout by the time the stream ends
 */
export interface ParsedStream {
  result?: ResultMessage;
  /** Set when a result line was present but failed validation */
  invalidResult?: string;
  initSessionId?: string;
  toolsUsed: string[];
  messageCount: number;
  skippedLines: number;
}

/**
 * How the process ended
 */
export interface ProcessOutcome {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stderr: string;
  elapsedMs: number;
  resumeSessionId?: string;
}

export interface StreamParser {
  pushLine(line: string): void;
  finish(): ParsedStream;
}

function parseJson(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}

/**
 * Create a line-by-line parser for one CLI run
 */
export function createStreamParser(): StreamParser {
  const toolsUsed = new Set<string>();
  let result: ResultMessage | undefined;
  let invalidResult: string | undefined;
  let initSessionId: string | undefined;
  let messageCount = 0;
  let skippedLines = 0;

  return {
    pushLine(rawLine: string): void {
      const line = rawLine.trim();
      if (line === '') {
        return;
      }

      const message = lineSchema.safeParse(parseJson(line));
      if (!message.success) {
        skippedLines += 1;
        return;
      }
      messageCount += 1;

      switch (message.data.type) {
        case 'system': {
          const init = initMessageSchema.safeParse(message.data);
          if (init.success) {
            initSessionId = init.data.session_id;
          }
          break;
        }

        case 'assistant': {
          const assistant = assistantMessageSchema.safeParse(message.data);
          if (assistant.success) {
            for (const block of assistant.data.message.content) {
              if (block.type === 'tool_use' && block.name !== undefined) {
                toolsUsed.add(block.name);
              }
            }
          }
          break;
        }

        case 'result': {
          const parsed = resultMessageSchema.safeParse(message.data);
          if (parsed.success) {
            result = parsed.data;
            invalidResult = undefined;
          } else {
            invalidResult = parsed.error.issues
              .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
              .join('; ');
          }
          break;
        }

        default:
          break;
      }
    },

    finish(): ParsedStream {
      const parsed: ParsedStream = {
        toolsUsed: [...toolsUsed],
        messageCount,
        skippedLines,
      };
      if (result !== undefined) {
        parsed.result = result;
      }
      if (invalidResult !== undefined) {
        parsed.invalidResult = invalidResult;
      }
      if (initSessionId !== undefined) {
        parsed.initSessionId = initSessionId;
      }
      return parsed;
    },
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value !== '' ? value : undefined;
}

/**
 * Combine parsed output and process outcome into the invocation result
 */
export function buildInvocationResult(
  parsed: ParsedStream,
  outcome: ProcessOutcome
): Result<InvocationResult> {
  const { result } = parsed;
  const maxTurnsReached = result?.subtype === MAX_TURNS_SUBTYPE;

  if (outcome.exitCode !== 0 && !maxTurnsReached) {
    const diagnostic = [outcome.stderr, result?.result ?? '']
      .filter((part) => part.trim() !== '')
      .join('\n');

    return (
      classifyCliFailure(diagnostic) ??
      failure(
        'EXECUTION_FAILED',
        outcome.exitCode === null
          ? `claude CLI was terminated by ${outcome.signal ?? 'a signal'}`
          : `claude CLI exited with code ${outcome.exitCode}`,
        {
          exitCode: outcome.exitCode,
          signal: outcome.signal,
          stderr: truncateDiagnostic(diagnostic),
        }
      )
    );
  }

  if (result === undefined) {
    return failure(
      'EXECUTION_FAILED',
      parsed.invalidResult !== undefined
        ? 'claude CLI produced a result message that could not be parsed'
        : 'claude CLI finished without a result message',
      {
        ...(parsed.invalidResult !== undefined && {
          issues: parsed.invalidResult,
        }),
        skippedLines: parsed.skippedLines,
        stderr: truncateDiagnostic(outcome.stderr),
      }
    );
  }

  if (result.is_error && !maxTurnsReached) {
    const diagnostic = [result.result ?? '', outcome.stderr]
      .filter((part) => part.trim() !== '')
      .join('\n');

    return (
      classifyCliFailure(diagnostic) ??
      failure('EXECUTION_FAILED', 'claude CLI reported an error result', {
        subtype: result.subtype ?? null,
        diagnostic: truncateDiagnostic(diagnostic),
      })
    );
  }

  const sessionId =
    nonEmpty(result.session_id) ??
    nonEmpty(parsed.initSessionId) ??
    nonEmpty(outcome.resumeSessionId);

  if (sessionId === undefined) {
    return failure(
      'EXECUTION_FAILED',
      'claude CLI did not report a session id',
      { stderr: truncateDiagnostic(outcome.stderr) }
    );
  }

  return success({
    content: result.result ?? '',
    sessionId,
    cost: result.total_cost_usd ?? result.cost_usd ?? 0,
    durationMs: Math.round(result.duration_ms ?? outcome.elapsedMs),
    numTurns: result.num_turns ?? 0,
    maxTurnsReached,
    toolsUsed: parsed.toolsUsed,
  });
}

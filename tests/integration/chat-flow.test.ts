/**
 * Chat Flow Integration Tests
 *
 * The real app, services and invoker, with only the process spawn
 * replaced by the in-process fake CLI.
 */

import { mkdtemp, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { Hono } from 'hono';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { createApp } from '@/api/app.js';
import { createCliInvoker } from '@/cli/invoker.js';
import type { CliInvoker } from '@/cli/types.js';
import type { CliConfig } from '@/lib/config.js';
import { makeNoopLogger } from '@/lib/logger.js';
import {
  createChatService,
  createInMemorySessionStore,
  createSessionService,
  createWorkspaceService,
} from '@/services/index.js';
import type { SessionService } from '@/services/index.js';

import {
  completeSuccessfully,
  createFakeSpawn,
  initMessage,
  resultMessage,
} from '../helpers/fake-cli.js';
import { chatRequest, readChat, readError } from '../helpers/http.js';

const cliConfig: CliConfig = {
  binaryPath: 'claude',
  timeoutMs: 5000,
  maxTurns: 50,
  allowedTools: [],
  skipPermissions: true,
  killGraceMs: 50,
};

describe('Chat Flow Integration', () => {
  let workspaceRoot: string;
  let fake: ReturnType<typeof createFakeSpawn>;
  let invoker: CliInvoker;
  let sessionService: SessionService;
  let app: Hono;

  function build(config: Partial<CliConfig> = {}): void {
    const logger = makeNoopLogger();
    fake = createFakeSpawn();
    invoker = createCliInvoker({
      config: { ...cliConfig, ...config },
      logger,
      spawn: fake.spawn,
      env: {},
    });
    sessionService = createSessionService({
      store: createInMemorySessionStore(),
      config: { ttlMs: 60 * 60 * 1000, maxSessionsPerUser: 10, maxSessions: 100 },
      logger,
    });
    app = createApp({
      apiKey: 'test-secret',
      logger,
      chatService: createChatService({
        invoker,
        sessionService,
        workspaceService: createWorkspaceService({ workspaceRoot }),
        logger,
      }),
    });
  }

  beforeEach(async () => {
    workspaceRoot = await mkdtemp(join(tmpdir(), 'chat-flow-'));
    build();
  });

  afterEach(async () => {
    await invoker.killAll();
    await rm(workspaceRoot, { recursive: true, force: true });
  });

  describe('Conversation', () => {
    it('should start a session and continue it', async () => {
      fake.onSpawn((proc) =>
        completeSuccessfully(proc, { sessionId: 'sess-abc', content: 'Hello!' })
      );

      const first = await app.request(
        '/api/v1/chat',
        chatRequest({ prompt: 'Say hello', user_id: 1 })
      );

      expect(first.status).toBe(200);
      const firstBody = await readChat(first);
      expect(firstBody.content).toBe('Hello!');
      expect(firstBody.session_id).toBe('sess-abc');
      expect(fake.spawn.mock.calls[0]?.[1]).not.toContain('--resume');

      fake.onSpawn((proc) =>
        completeSuccessfully(proc, {
          sessionId: 'sess-abc',
          content: 'You said hello.',
        })
      );

      const second = await app.request(
        '/api/v1/chat',
        chatRequest({
          prompt: 'What did I say?',
          session_id: firstBody.session_id,
          user_id: 1,
        })
      );

      expect(second.status).toBe(200);
      expect((await readChat(second)).content).toBe('You said hello.');
      expect(fake.spawn.mock.calls[1]?.[1].slice(0, 2)).toEqual([
        '--resume',
        'sess-abc',
      ]);
      expect((await sessionService.get('sess-abc'))?.messageCount).toBe(2);
    });

    it('should accept a long multibyte prompt and send it on stdin', async () => {
      const prompt = '你'.repeat(50_000);
      fake.onSpawn((proc) => completeSuccessfully(proc));

      const res = await app.request(
        '/api/v1/chat',
        chatRequest({ prompt, user_id: 1 })
      );

      expect(res.status).toBe(200);
      expect(fake.last().input).toBe(prompt);
    });

    it('should run the CLI in the user workspace', async () => {
      fake.onSpawn((proc) => completeSuccessfully(proc));

      await app.request(
        '/api/v1/chat',
        chatRequest({ prompt: 'Say hello', user_id: 1 })
      );

      const directory = join(workspaceRoot, 'claude_user_1');
      expect(fake.spawn.mock.calls[0]?.[2].cwd).toBe(directory);
      expect((await stat(directory)).isDirectory()).toBe(true);
    });

    it('should report the turn limit as a normal reply', async () => {
      fake.onSpawn((proc) => {
        proc.writeMessages(
          initMessage('sess-1'),
          resultMessage({
            subtype: 'error_max_turns',
            is_error: true,
            result: undefined,
            num_turns: 50,
          })
        );
        proc.complete(0);
      });

      const res = await app.request(
        '/api/v1/chat',
        chatRequest({ prompt: 'Work hard', user_id: 1 })
      );

      expect(res.status).toBe(200);
      expect(await readChat(res)).toEqual({
        content: '',
        session_id: 'sess-1',
        cost: 0.0123,
        duration_ms: 1500,
      });
    });
  });

  describe('Rejected requests', () => {
    it('should reject an empty prompt without running the CLI', async () => {
      const res = await app.request(
        '/api/v1/chat',
        chatRequest({ prompt: '', user_id: 1 })
      );

      expect(res.status).toBe(400);
      expect((await readError(res)).error.code).toBe('INVALID_REQUEST');
      expect(fake.spawn).not.toHaveBeenCalled();
    });

    it('should reject a wrong token without running the CLI', async () => {
      const res = await app.request(
        '/api/v1/chat',
        chatRequest({ prompt: 'Say hello', user_id: 1 }, 'wrong-token')
      );

      expect(res.status).toBe(401);
      expect(fake.spawn).not.toHaveBeenCalled();
    });
  });

  describe('Health', () => {
    it('should return exactly status ok', async () => {
      const res = await app.request('/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: 'ok' });
    });
  });

  describe('CLI failures', () => {
    it('should time out and leave no process behind', async () => {
      build({ timeoutMs: 30 });
      fake.onSpawn((proc) => proc.writeMessages(initMessage('sess-slow')));

      const res = await app.request(
        '/api/v1/chat',
        chatRequest({ prompt: 'Take forever', user_id: 1 })
      );

      expect(res.status).toBe(504);
      expect((await readError(res)).error.code).toBe('TIMEOUT');
      const proc = fake.last();
      expect(proc.kill).toHaveBeenCalledWith('SIGTERM');
      expect(proc.hasExited()).toBe(true);
      expect(invoker.getActiveCount()).toBe(0);
      expect(await sessionService.get('sess-slow')).toBeNull();
    });

    it('should explain how to authenticate the CLI', async () => {
      fake.onSpawn((proc) => {
        proc.writeStderr('Error: not authenticated. Run claude setup-token\n');
        proc.complete(1);
      });

      const res = await app.request(
        '/api/v1/chat',
        chatRequest({ prompt: 'Say hello', user_id: 1 })
      );

      expect(res.status).toBe(503);
      const body = await readError(res);
      expect(body.error.code).toBe('AUTHENTICATION_REQUIRED');
      expect(body.error.details?.instructions).toEqual(
        expect.stringContaining('claude setup-token')
      );
    });

    it('should drop a session the CLI can no longer resume', async () => {
      fake.onSpawn((proc) => completeSuccessfully(proc, { sessionId: 'sess-gone' }));
      await app.request(
        '/api/v1/chat',
        chatRequest({ prompt: 'Say hello', user_id: 1 })
      );

      fake.onSpawn((proc) => {
        proc.writeStderr('No conversation found with session ID: sess-gone\n');
        proc.complete(1);
      });

      const res = await app.request(
        '/api/v1/chat',
        chatRequest({ prompt: 'Again', session_id: 'sess-gone', user_id: 1 })
      );

      expect(res.status).toBe(409);
      expect((await readError(res)).error.code).toBe('SESSION_INVALID');
      expect(await sessionService.get('sess-gone')).toBeNull();
    });
  });
});

/**
 * Application Entry Point
 *
 * Validates configuration, wires the services and starts the Hono server.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';

import { createApp } from './api/app.js';
import { createCliInvoker } from './cli/index.js';
import {
  AUTH_INSTRUCTIONS,
  ConfigError,
  checkCliCredentials,
  loadConfig,
  makeLogger,
} from './lib/index.js';
import type { AppConfig } from './lib/index.js';
import {
  createChatService,
  createInMemorySessionStore,
  createSessionService,
  createWorkspaceService,
} from './services/index.js';

const logger = makeLogger({ component: 'server' });

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.fatal({ issues: error.issues }, 'Invalid configuration');
      process.exit(1);
    }
    throw error;
  }
}

async function bootstrap(): Promise<void> {
  const config = readConfig();

  const credentials = await checkCliCredentials({
    credentialsPath: config.credentialsPath,
  });
  if (credentials.available) {
    logger.info({ source: credentials.source }, 'claude CLI credentials found');
  } else {
    logger.warn(
      { credentialsPath: config.credentialsPath, instructions: AUTH_INSTRUCTIONS },
      'claude CLI credentials not found; chat requests will fail until the CLI is authenticated'
    );
  }

  // Wire services
  const invoker = createCliInvoker({
    config: config.cli,
    logger: makeLogger({ component: 'cli' }, config.logLevel),
  });

  const sessionService = createSessionService({
    store: createInMemorySessionStore(),
    config: config.sessions,
    logger: makeLogger({ component: 'sessions' }, config.logLevel),
  });

  const chatService = createChatService({
    invoker,
    sessionService,
    workspaceService: createWorkspaceService({
      workspaceRoot: config.workspaceRoot,
    }),
    logger: makeLogger({ component: 'chat' }, config.logLevel),
  });

  const app = createApp({
    apiKey: config.apiKey,
    chatService,
    logger: makeLogger({ component: 'http' }, config.logLevel),
    allowedOrigins: config.corsOrigins,
  });

  const server = serve(
    { fetch: app.fetch, port: config.port, hostname: config.host },
    (info) => {
      logger.info(
        {
          host: config.host,
          port: info.port,
          binaryPath: config.cli.binaryPath,
          timeoutMs: config.cli.timeoutMs,
          maxTurns: config.cli.maxTurns,
        },
        'Server started'
      );
    }
  );

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');

    server.close();
    await invoker.killAll();
    await sessionService.cleanupExpired();

    logger.info('Shutdown complete');
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error(
          { error: error instanceof Error ? error.message : String(error) },
          'Shutdown failed'
        );
        process.exit(1);
      });
    });
  }
}

bootstrap().catch((error: unknown) => {
  logger.fatal(
    { error: error instanceof Error ? error.message : String(error) },
    'Failed to start server'
  );
  process.exit(1);
});

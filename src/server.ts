/**
 * Process entry point
 *
 * Loads configuration, opens the SQLite store, and serves REST and WebSocket
 * traffic on one HTTP server.
 */

import { createServer } from 'http';
import { getRequestListener } from '@hono/node-server';
import { loadEnv, type Env } from './config/env.js';
import { logger } from './config/logger.js';
import { ClaudeAgentEngine } from './lib/agent-engine/claude-sdk/index.js';
import { SqlitePersistenceAdapter } from './lib/persistence/sqlite-adapter.js';
import { createAgentRunRuntime } from './runtime.js';

async function main(): Promise<void> {
  let env: Env;
  try {
    env = loadEnv();
  } catch (error) {
    logger.fatal({ error }, 'Invalid environment configuration');
    process.exit(1);
  }

  const persistence = new SqlitePersistenceAdapter(env.SQLITE_DB_PATH);
  logger.info({ dbPath: env.SQLITE_DB_PATH }, 'SQLite persistence adapter initialized');

  const runtime = createAgentRunRuntime({
    persistence,
    engine: new ClaudeAgentEngine(),
    model: env.AGENT_MODEL,
    apiKey: env.ANTHROPIC_API_KEY,
    maxTurns: env.AGENT_MAX_TURNS,
    batchSize: env.MESSAGE_BATCH_SIZE,
  });

  const app = runtime.createRestServer({ corsOrigins: env.CORS_ORIGINS });
  const httpServer = createServer(getRequestListener(app.fetch));
  const io = runtime.createWebSocketServer(httpServer, { corsOrigins: env.CORS_ORIGINS });

  httpServer.listen(env.PORT, () => {
    logger.info({ port: env.PORT }, 'Server is running');
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down gracefully...');

    // Stop accepting connections, then let active runs flush and record their status
    await new Promise<void>((resolve) => {
      io.close(() => resolve());
    });
    await runtime.shutdown();
    persistence.close();

    logger.info('Shutdown complete');
    process.exit(0);
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ error }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Failed to start server');
  process.exit(1);
});

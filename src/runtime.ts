/**
 * Runtime factory - wires the run orchestration together
 *
 * @example
 * ```typescript
 * import { createServer } from 'http';
 * import { getRequestListener } from '@hono/node-server';
 *
 * const runtime = createAgentRunRuntime({
 *   persistence: new SqlitePersistenceAdapter('./data/agent-sessions.db'),
 *   engine: new ClaudeAgentEngine(),
 *   model: 'claude-sonnet-4-5',
 * });
 *
 * const app = runtime.createRestServer();
 * const httpServer = createServer(getRequestListener(app.fetch));
 * runtime.createWebSocketServer(httpServer);
 * httpServer.listen(3001);
 * ```
 */

import type { Server as HTTPServer } from 'http';
import type { Hono } from 'hono';
import type { Server as SocketIOServer } from 'socket.io';
import { logger } from './config/logger.js';
import { AgentRunController } from './core/agent-run-controller.js';
import { AgentRunSupervisor } from './core/agent-run-supervisor.js';
import { EventBus } from './core/event-bus.js';
import { DEFAULT_BATCH_SIZE } from './core/message-buffer.js';
import { SessionService } from './core/session-service.js';
import { SessionTaskRegistry } from './core/session-task-registry.js';
import type { AgentEngine } from './lib/agent-engine/base.js';
import { createRestServer } from './transport/rest/server.js';
import { createWebSocketServer } from './transport/websocket/index.js';
import type {
  ClientToServerEvents,
  InterServerEvents,
  ServerToClientEvents,
  SocketData,
} from './types/events.js';
import type { PersistenceAdapter } from './types/persistence-adapter.js';

export interface AgentRunRuntimeConfig {
  persistence: PersistenceAdapter;
  engine: AgentEngine;
  model: string;
  /** Fallback credential for runs that do not carry one */
  apiKey?: string;
  maxTurns?: number;
  batchSize?: number;
}

export type AgentRunSocketServer = SocketIOServer<
  ClientToServerEvents,
  ServerToClientEvents,
  InterServerEvents,
  SocketData
>;

export type AgentRunRuntime = {
  eventBus: EventBus;
  registry: SessionTaskRegistry;
  supervisor: AgentRunSupervisor;
  sessions: SessionService;
  persistence: PersistenceAdapter;

  /** Hono app serving the session REST API */
  createRestServer: (options?: { corsOrigins?: string[] }) => Hono;

  /** Attach the live run transport to an HTTP server */
  createWebSocketServer: (
    httpServer: HTTPServer,
    options?: { corsOrigins?: string[] }
  ) => AgentRunSocketServer;

  /** Cancel all active runs and wait for them to exit */
  shutdown: () => Promise<void>;
};

export function createAgentRunRuntime(config: AgentRunRuntimeConfig): AgentRunRuntime {
  logger.info({ model: config.model }, 'Creating agent run runtime...');

  const { persistence } = config;
  const eventBus = new EventBus();
  const registry = new SessionTaskRegistry();

  const controller = new AgentRunController(config.engine, registry, eventBus, {
    apiKey: config.apiKey,
    model: config.model,
    maxTurns: config.maxTurns,
  });
  const supervisor = new AgentRunSupervisor(
    controller,
    registry,
    eventBus,
    config.batchSize ?? DEFAULT_BATCH_SIZE
  );
  const sessions = new SessionService(persistence, supervisor, eventBus);

  return {
    eventBus,
    registry,
    supervisor,
    sessions,
    persistence,

    createRestServer: (options = {}) =>
      createRestServer({ sessions, supervisor, corsOrigins: options.corsOrigins }),

    createWebSocketServer: (httpServer, options = {}) =>
      createWebSocketServer(httpServer, { supervisor, persistence, eventBus }, options),

    shutdown: async () => {
      logger.info('Shutting down agent run runtime...');
      await supervisor.shutdown();
      eventBus.removeAllListeners();
      logger.info('Agent run runtime shutdown complete');
    },
  };
}

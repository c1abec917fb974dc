/**
 * WebSocket Server - Socket.io setup
 *
 * Live streaming of runs to the client that started them. Session records are
 * managed through the REST API.
 */

import { Server as SocketIOServer } from 'socket.io';
import type { Server as HTTPServer } from 'http';
import { logger } from '../../config/logger.js';
import type { AgentRunSupervisor } from '../../core/agent-run-supervisor.js';
import type { EventBus } from '../../core/event-bus.js';
import type { PersistenceAdapter } from '../../types/persistence-adapter.js';
import type {
  ClientToServerEvents,
  InterServerEvents,
  ServerToClientEvents,
  SocketData,
} from '../../types/events.js';
import { setupEventListeners } from './event-listeners.js';
import { setupSessionRunHandlers } from './handlers/session-run.js';

export function createWebSocketServer(
  httpServer: HTTPServer,
  deps: {
    supervisor: AgentRunSupervisor;
    persistence: PersistenceAdapter;
    eventBus: EventBus;
  },
  options: { corsOrigins?: string[] } = {}
): SocketIOServer<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData> {
  const io = new SocketIOServer<
    ClientToServerEvents,
    ServerToClientEvents,
    InterServerEvents,
    SocketData
  >(httpServer, {
    cors: {
      origin: options.corsOrigins ?? '*',
    },
    path: '/socket.io',
  });

  logger.info('Initializing WebSocket server...');

  setupEventListeners(io, deps.eventBus);

  io.on('connection', (socket) => {
    logger.info(
      {
        socketId: socket.id,
        transport: socket.conn.transport.name,
      },
      'Client connected to WebSocket'
    );

    socket.data.joinedAt = Date.now();

    setupSessionRunHandlers(socket, {
      supervisor: deps.supervisor,
      persistence: deps.persistence,
    });
  });

  logger.info('WebSocket server initialized');

  return io;
}

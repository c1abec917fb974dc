/**
 * Event Bus to WebSocket Bridge
 *
 * Listens to domain events from EventBus and translates them to Socket.io events.
 */

import type { Server as SocketIOServer } from 'socket.io';
import { logger } from '../../config/logger.js';
import type { EventBus } from '../../core/event-bus.js';
import type {
  ClientToServerEvents,
  InterServerEvents,
  ServerToClientEvents,
  SocketData,
} from '../../types/events.js';

/**
 * Setup event listeners to bridge EventBus → Socket.io
 */
export function setupEventListeners(
  io: SocketIOServer<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>,
  eventBus: EventBus
): void {
  /**
   * Session status changed - broadcast to the session room
   */
  eventBus.on('session:status', (data) => {
    io.to(`session:${data.sessionId}`).emit('session:status', {
      sessionId: data.sessionId,
      status: data.status,
    });
    logger.debug({ sessionId: data.sessionId, status: data.status }, 'Broadcast session status');
  });
}

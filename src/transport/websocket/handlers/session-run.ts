/**
 * Session Run Handlers
 *
 * WebSocket handlers for starting and cancelling runs. The socket that starts
 * a run is its live viewer and receives every frame.
 */

import { z } from 'zod';
import { logger } from '../../../config/logger.js';
import type { AgentRunSupervisor } from '../../../core/agent-run-supervisor.js';
import { getErrorMessage } from '../../../lib/errors.js';
import type { PersistenceAdapter } from '../../../types/persistence-adapter.js';
import type { StreamFrame } from '../../../types/stream-events.js';
import { SocketLiveConnection, type TypedSocket } from '../socket-live-connection.js';

const runRequestSchema = z.object({
  sessionId: z.string().min(1),
  message: z.string().default(''),
  credential: z.string().optional(),
});

function errorFrame(error: string): StreamFrame {
  return { type: 'error', content: { error }, timestamp: new Date().toISOString() };
}

/**
 * Setup run lifecycle event handlers on a socket
 */
export function setupSessionRunHandlers(
  socket: TypedSocket,
  deps: {
    supervisor: AgentRunSupervisor;
    persistence: PersistenceAdapter;
  }
): void {
  const { supervisor, persistence } = deps;

  /**
   * Start a run and stream its frames to this socket
   */
  socket.on('session:run', async (request, callback) => {
    const reply = typeof callback === 'function' ? callback : () => undefined;

    const fail = (error: string) => {
      socket.emit('session:frame', errorFrame(error));
      reply({ success: false, error });
    };

    try {
      const parsed = runRequestSchema.safeParse(request);
      if (!parsed.success) {
        fail('Invalid run request');
        return;
      }
      const { sessionId, message, credential } = parsed.data;

      const session = await persistence.getSession(sessionId);
      if (!session) {
        logger.warn({ socketId: socket.id, sessionId }, 'Session not found');
        fail('Session not found');
        return;
      }

      if (!message) {
        fail('No message provided');
        return;
      }

      // No await between the check and start: a concurrent request must see this run
      if (supervisor.isActive(sessionId)) {
        fail('Session is already running');
        return;
      }

      const handle = supervisor.start({
        sessionId,
        message,
        persistence,
        connection: new SocketLiveConnection(socket),
        credential: credential || undefined,
      });

      socket.data.sessionId = sessionId;
      socket.data.runId = handle.runId;

      await socket.join(`session:${sessionId}`);

      logger.info({ socketId: socket.id, sessionId, runId: handle.runId }, 'Run started from WebSocket');
      reply({ success: true, runId: handle.runId });
    } catch (error) {
      logger.error({ error, socketId: socket.id }, 'Failed to start run');
      fail(getErrorMessage(error));
    }
  });

  /**
   * Cancel a session's running task
   */
  socket.on('session:cancel', async (sessionId, callback) => {
    const reply = typeof callback === 'function' ? callback : () => undefined;

    try {
      const cancelled = await supervisor.cancel(sessionId, 'cancelled by client');
      reply({ success: true, cancelled });
    } catch (error) {
      logger.error({ error, socketId: socket.id, sessionId }, 'Failed to cancel run');
      reply({ success: false, cancelled: false });
    }
  });

  /**
   * A viewer leaving cancels the run it started
   */
  socket.on('disconnect', async (reason) => {
    const { sessionId, runId } = socket.data;
    if (!sessionId || !runId) {
      return;
    }

    const active = supervisor.getRun(sessionId);
    if (!active || active.runId !== runId) {
      return;
    }

    logger.info({ socketId: socket.id, sessionId, runId, reason }, 'Live client disconnected, cancelling run');
    try {
      await supervisor.cancel(sessionId, 'client disconnected');
    } catch (error) {
      logger.error({ error, sessionId, runId }, 'Failed to cancel run after disconnect');
    }
  });
}

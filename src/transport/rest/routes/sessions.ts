import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { AgentRunSupervisor } from '../../../core/agent-run-supervisor.js';
import type { SessionService } from '../../../core/session-service.js';
import { httpError } from '../server.js';

const createSessionSchema = z.object({
  storeScreenshots: z.boolean().optional(),
  screenshotScale: z.number().int().min(1).max(8).optional(),
  screenshotQuality: z.number().int().min(10).max(100).optional(),
});

export function createSessionRoutes(
  sessions: SessionService,
  supervisor: AgentRunSupervisor
): Hono {
  const app = new Hono()

  /**
   * POST /api/sessions
   * Create a new session with optional screenshot configuration
   */
  .post('/', zValidator('json', createSessionSchema), async (c) => {
    const session = await sessions.createSession(c.req.valid('json'));
    return c.json(session, 201);
  })

  /**
   * GET /api/sessions
   * List all sessions, newest first
   */
  .get('/', async (c) => {
    const list = await sessions.listSessions();
    return c.json({ sessions: list });
  })

  /**
   * GET /api/sessions/:id
   */
  .get('/:id', async (c) => {
    const session = await sessions.getSession(c.req.param('id'));
    if (!session) {
      throw httpError(404, 'Session not found', 'SESSION_NOT_FOUND');
    }
    return c.json({ ...session, isRunning: supervisor.isActive(session.id) });
  })

  /**
   * GET /api/sessions/:id/messages
   * Persisted messages in insertion order
   */
  .get('/:id/messages', async (c) => {
    const messages = await sessions.getMessages(c.req.param('id'));
    return c.json({ messages });
  })

  /**
   * POST /api/sessions/:id/cancel
   * Cancel the running task, if any
   */
  .post('/:id/cancel', async (c) => {
    const cancelled = await supervisor.cancel(c.req.param('id'), 'cancelled via API');
    return c.json({ cancelled });
  })

  /**
   * PATCH /api/sessions/:id/finish
   * Mark a session as finished, stopping its run first
   */
  .patch('/:id/finish', async (c) => {
    const session = await sessions.finishSession(c.req.param('id'));
    if (!session) {
      throw httpError(404, 'Session not found', 'SESSION_NOT_FOUND');
    }
    return c.json(session);
  })

  /**
   * DELETE /api/sessions/:id
   * Delete a session and all its messages
   */
  .delete('/:id', async (c) => {
    const deleted = await sessions.deleteSession(c.req.param('id'));
    if (!deleted) {
      throw httpError(404, 'Session not found', 'SESSION_NOT_FOUND');
    }
    return c.json({ message: 'Session deleted' });
  });

  return app;
}

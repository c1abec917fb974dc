import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { HTTPException } from 'hono/http-exception';
import { logger as requestLogger } from 'hono/logger';
import { logger } from '../../config/logger.js';
import { SessionNotFoundError } from '../../lib/errors.js';
import type { AgentRunSupervisor } from '../../core/agent-run-supervisor.js';
import type { SessionService } from '../../core/session-service.js';
import { createSessionRoutes } from './routes/sessions.js';

export interface ErrorBody {
  error: string;
  code?: string;
}

/**
 * Error response helper
 */
export function errorResponse(message: string, code?: string): ErrorBody {
  return {
    error: message,
    ...(code && { code }),
  };
}

/**
 * HTTPException whose message is a JSON error body, rendered by the global handler
 */
export function httpError(status: 400 | 404 | 409 | 500, message: string, code: string): HTTPException {
  return new HTTPException(status, {
    message: JSON.stringify(errorResponse(message, code)),
  });
}

function parseErrorBody(message: string): ErrorBody {
  try {
    const parsed: unknown = JSON.parse(message);
    if (typeof parsed === 'object' && parsed !== null && 'error' in parsed && typeof parsed.error === 'string') {
      const code = 'code' in parsed && typeof parsed.code === 'string' ? parsed.code : undefined;
      return errorResponse(parsed.error, code);
    }
  } catch {
    // Plain message, handled below
  }
  return errorResponse(message);
}

export const createRestServer = ({
  sessions,
  supervisor,
  corsOrigins,
}: {
  sessions: SessionService;
  supervisor: AgentRunSupervisor;
  corsOrigins?: string[];
}): Hono => {
  const app = new Hono()

  // Middleware
  .use('*', cors({ origin: corsOrigins ?? '*' }))
  .use('*', requestLogger((message) => logger.debug(message)))

  // Global error handler
  .onError((err, c) => {
    if (err instanceof HTTPException) {
      return c.json(parseErrorBody(err.message), err.status);
    }

    if (err instanceof SessionNotFoundError) {
      return c.json(errorResponse('Session not found', 'SESSION_NOT_FOUND'), 404);
    }

    // Unexpected errors
    logger.error({ error: err }, 'Unexpected error');
    return c.json(errorResponse('Internal server error', 'INTERNAL_ERROR'), 500);
  })

  // Health check
  .get('/health', (c) => c.json({ status: 'ok', activeRuns: supervisor.activeSessionIds().length }))

  .route('/api/sessions', createSessionRoutes(sessions, supervisor));

  return app;
};

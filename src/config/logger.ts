import pino from 'pino';

/**
 * Process-wide structured logger.
 *
 * Level comes from LOG_LEVEL so tests can run with `silent` without
 * going through the validated env (which also needs a logger).
 */
export const logger = pino({
  name: 'agent-run-server',
  level: process.env.LOG_LEVEL || 'info',
});

export type Logger = typeof logger;

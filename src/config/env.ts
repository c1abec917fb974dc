import { config } from 'dotenv';
import { z } from 'zod';

// Blank values in .env files count as unset
const blankAsUnset = (value: unknown) => (value === '' ? undefined : value);

const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3001),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  CORS_ORIGINS: z
    .string()
    .default('*')
    .transform((value) => value.split(',').map((origin) => origin.trim()).filter(Boolean)),

  // Persistence
  SQLITE_DB_PATH: z.string().min(1).default('./data/agent-sessions.db'),

  // Agent engine
  ANTHROPIC_API_KEY: z.preprocess(blankAsUnset, z.string().min(1).optional()),
  AGENT_MODEL: z.string().min(1).default('claude-sonnet-4-5'),
  AGENT_MAX_TURNS: z.preprocess(blankAsUnset, z.coerce.number().int().positive().optional()),

  // Batch size for message writes during a run
  MESSAGE_BATCH_SIZE: z.coerce.number().int().positive().default(10),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validate an environment source. Throws a ZodError describing every invalid key.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  return envSchema.parse(source);
}

/**
 * Load `.env` into process.env and validate it.
 */
export function loadEnv(): Env {
  config();
  return parseEnv(process.env);
}

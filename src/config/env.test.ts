import { describe, it, expect } from 'vitest';
import { parseEnv } from './env.js';

describe('parseEnv', () => {
  it('applies defaults', () => {
    const env = parseEnv({});

    expect(env.NODE_ENV).toBe('development');
    expect(env.PORT).toBe(3001);
    expect(env.LOG_LEVEL).toBe('info');
    expect(env.CORS_ORIGINS).toEqual(['*']);
    expect(env.SQLITE_DB_PATH).toBe('./data/agent-sessions.db');
    expect(env.ANTHROPIC_API_KEY).toBeUndefined();
    expect(env.AGENT_MODEL).toBe('claude-sonnet-4-5');
    expect(env.AGENT_MAX_TURNS).toBeUndefined();
    expect(env.MESSAGE_BATCH_SIZE).toBe(10);
  });

  it('coerces numbers and splits origins', () => {
    const env = parseEnv({
      PORT: '8080',
      MESSAGE_BATCH_SIZE: '25',
      AGENT_MAX_TURNS: '5',
      CORS_ORIGINS: 'http://localhost:3000, http://localhost:5173',
      ANTHROPIC_API_KEY: 'test-secret',
    });

    expect(env.PORT).toBe(8080);
    expect(env.MESSAGE_BATCH_SIZE).toBe(25);
    expect(env.AGENT_MAX_TURNS).toBe(5);
    expect(env.CORS_ORIGINS).toEqual(['http://localhost:3000', 'http://localhost:5173']);
    expect(env.ANTHROPIC_API_KEY).toBe('test-secret');
  });

  it('treats blank optional values as unset', () => {
    const env = parseEnv({ ANTHROPIC_API_KEY: '', AGENT_MAX_TURNS: '' });

    expect(env.ANTHROPIC_API_KEY).toBeUndefined();
    expect(env.AGENT_MAX_TURNS).toBeUndefined();
  });

  it('rejects an invalid batch size', () => {
    expect(() => parseEnv({ MESSAGE_BATCH_SIZE: '0' })).toThrow();
  });
});

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SqlitePersistenceAdapter } from './sqlite-adapter.js';
import { makeSession } from '../../test/helpers.js';

describe('SqlitePersistenceAdapter', () => {
  let adapter: SqlitePersistenceAdapter;

  beforeEach(() => {
    adapter = new SqlitePersistenceAdapter(':memory:');
  });

  afterEach(() => {
    adapter.close();
  });

  it('round-trips a session record', async () => {
    const session = makeSession({ storeScreenshots: true, screenshotScale: 4, screenshotQuality: 50 });

    await adapter.createSession(session);

    expect(await adapter.getSession('session-1')).toEqual(session);
    expect(await adapter.getSession('missing')).toBeNull();
  });

  it('lists sessions newest first', async () => {
    await adapter.createSession(makeSession({ id: 'old', createdAt: 1000 }));
    await adapter.createSession(makeSession({ id: 'new', createdAt: 2000 }));
    await adapter.createSession(makeSession({ id: 'newer-same-time', createdAt: 2000 }));

    const sessions = await adapter.listSessions();

    expect(sessions.map((session) => session.id)).toEqual(['newer-same-time', 'new', 'old']);
  });

  it('updates the session status', async () => {
    await adapter.createSession(makeSession());

    await adapter.updateSessionStatus('session-1', 'running');

    expect((await adapter.getSession('session-1'))?.status).toBe('running');
  });

  it('inserts messages in order across batches', async () => {
    await adapter.createSession(makeSession());

    await adapter.bulkInsertMessages('session-1', [
      { content: '{"n":1}', createdAt: 10 },
      { content: '{"n":2}', createdAt: 11 },
    ]);
    await adapter.bulkInsertMessages('session-1', [{ content: '{"n":3}', createdAt: 12 }]);

    const messages = await adapter.listMessages('session-1');
    expect(messages.map((message) => message.content)).toEqual(['{"n":1}', '{"n":2}', '{"n":3}']);
    expect(messages[0]).toEqual({ id: 1, sessionId: 'session-1', content: '{"n":1}', createdAt: 10 });
  });

  it('rejects a batch for an unknown session and stores none of it', async () => {
    await expect(
      adapter.bulkInsertMessages('missing', [
        { content: 'a', createdAt: 1 },
        { content: 'b', createdAt: 2 },
      ])
    ).rejects.toThrow();

    expect(await adapter.listMessages('missing')).toEqual([]);
  });

  it('deletes messages and sessions', async () => {
    await adapter.createSession(makeSession());
    await adapter.bulkInsertMessages('session-1', [{ content: 'x', createdAt: 1 }]);

    await adapter.deleteMessagesForSession('session-1');
    expect(await adapter.listMessages('session-1')).toEqual([]);

    await adapter.deleteSession('session-1');
    expect(await adapter.getSession('session-1')).toBeNull();
  });
});

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Hono } from 'hono';
import { logger } from '../../config/logger.js';
import { createAgentRunRuntime, type AgentRunRuntime } from '../../runtime.js';
import { RecordingPersistence, ScriptedEngine, deferred, waitForAbort } from '../../test/helpers.js';

describe('REST API', () => {
  let persistence: RecordingPersistence;
  let runtime: AgentRunRuntime;
  let app: Hono;
  let engineStarted: ReturnType<typeof deferred>;

  beforeEach(() => {
    engineStarted = deferred();
    persistence = new RecordingPersistence();
    runtime = createAgentRunRuntime({
      persistence,
      engine: new ScriptedEngine(async (_hooks, signal) => {
        engineStarted.resolve();
        await waitForAbort(signal);
      }),
      model: 'test-model',
      apiKey: 'test-secret',
    });
    app = runtime.createRestServer();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function jsonRequest(path: string, method: string, body: unknown) {
    return app.request(path, {
      method,
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  it('reports health', async () => {
    const res = await app.request('/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', activeRuns: 0 });
  });

  it('logs incoming requests through the application logger', async () => {
    const debugLog = vi.spyOn(logger, 'debug');

    await app.request('/health');

    expect(debugLog).toHaveBeenCalledWith('<-- GET /health');
  });

  it('creates a session with a screenshot policy', async () => {
    const res = await jsonRequest('/api/sessions', 'POST', { storeScreenshots: true, screenshotScale: 4 });

    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject({
      status: 'active',
      storeScreenshots: true,
      screenshotScale: 4,
      screenshotQuality: 70,
    });
    expect(await persistence.listSessions()).toHaveLength(1);
  });

  it('rejects an out-of-range screenshot scale', async () => {
    const res = await jsonRequest('/api/sessions', 'POST', { screenshotScale: 9 });

    expect(res.status).toBe(400);
    expect(await persistence.listSessions()).toHaveLength(0);
  });

  it('returns 404 for an unknown session', async () => {
    const res = await app.request('/api/sessions/missing');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Session not found', code: 'SESSION_NOT_FOUND' });
  });

  it('gets and lists sessions', async () => {
    const session = await runtime.sessions.createSession();

    const single = await app.request(`/api/sessions/${session.id}`);
    expect(single.status).toBe(200);
    expect(await single.json()).toEqual({ ...session, isRunning: false });

    const list = await app.request('/api/sessions');
    expect(await list.json()).toEqual({ sessions: [session] });
  });

  it('returns persisted messages', async () => {
    const session = await runtime.sessions.createSession();
    await persistence.bulkInsertMessages(session.id, [{ content: '{"type":"text","text":"hi"}', createdAt: 5 }]);

    const res = await app.request(`/api/sessions/${session.id}/messages`);

    expect(await res.json()).toEqual({
      messages: [{ id: 1, sessionId: session.id, content: '{"type":"text","text":"hi"}', createdAt: 5 }],
    });
  });

  it('returns 404 for messages of an unknown session', async () => {
    const res = await app.request('/api/sessions/missing/messages');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Session not found', code: 'SESSION_NOT_FOUND' });
  });

  it('cancels a running task', async () => {
    const session = await runtime.sessions.createSession();
    const handle = runtime.supervisor.start({ sessionId: session.id, message: 'hello', persistence });
    await engineStarted.promise;

    const res = await app.request(`/api/sessions/${session.id}/cancel`, { method: 'POST' });

    expect(await res.json()).toEqual({ cancelled: true });
    expect(await handle.done).toEqual({ status: 'cancelled', reason: 'cancelled via API' });
  });

  it('reports nothing to cancel when no task runs', async () => {
    const session = await runtime.sessions.createSession();

    const res = await app.request(`/api/sessions/${session.id}/cancel`, { method: 'POST' });

    expect(await res.json()).toEqual({ cancelled: false });
  });

  it('finishes a session', async () => {
    const session = await runtime.sessions.createSession();
    runtime.supervisor.start({ sessionId: session.id, message: 'hello', persistence });
    await engineStarted.promise;

    const res = await app.request(`/api/sessions/${session.id}/finish`, { method: 'PATCH' });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ...session, status: 'finished' });
    expect(runtime.supervisor.isActive(session.id)).toBe(false);
    expect(persistence.statusUpdates).toEqual(['running', 'cancelled', 'finished']);
  });

  it('deletes a session', async () => {
    const session = await runtime.sessions.createSession();

    const res = await app.request(`/api/sessions/${session.id}`, { method: 'DELETE' });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ message: 'Session deleted' });

    const again = await app.request(`/api/sessions/${session.id}`, { method: 'DELETE' });
    expect(again.status).toBe(404);
  });
});

/**
 * SessionService - session and message records around the run lifecycle
 *
 * Plain data access, except where closing or deleting a session has to stop
 * its run first.
 */

import { randomUUID } from 'crypto';
import { logger } from '../config/logger.js';
import { SessionNotFoundError } from '../lib/errors.js';
import type { PersistenceAdapter } from '../types/persistence-adapter.js';
import {
  DEFAULT_SCREENSHOT_POLICY,
  type CreateSessionArgs,
  type MessageRecord,
  type SessionRecord,
} from '../types/session.js';
import type { AgentRunSupervisor } from './agent-run-supervisor.js';
import type { EventBus } from './event-bus.js';

export class SessionService {
  constructor(
    private readonly persistence: PersistenceAdapter,
    private readonly supervisor: AgentRunSupervisor,
    private readonly eventBus: EventBus,
  ) {}

  async createSession(args: CreateSessionArgs = {}): Promise<SessionRecord> {
    const session: SessionRecord = {
      id: randomUUID(),
      status: 'active',
      createdAt: Date.now(),
      storeScreenshots: args.storeScreenshots ?? DEFAULT_SCREENSHOT_POLICY.storeScreenshots,
      screenshotScale: args.screenshotScale ?? DEFAULT_SCREENSHOT_POLICY.screenshotScale,
      screenshotQuality: args.screenshotQuality ?? DEFAULT_SCREENSHOT_POLICY.screenshotQuality,
    };

    await this.persistence.createSession(session);
    logger.info({ sessionId: session.id }, 'Session created');
    return session;
  }

  getSession(sessionId: string): Promise<SessionRecord | null> {
    return this.persistence.getSession(sessionId);
  }

  listSessions(): Promise<SessionRecord[]> {
    return this.persistence.listSessions();
  }

  /**
   * Persisted messages of a session in insertion order
   *
   * @throws SessionNotFoundError
   */
  async getMessages(sessionId: string): Promise<MessageRecord[]> {
    const session = await this.persistence.getSession(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return this.persistence.listMessages(sessionId);
  }

  /**
   * Close a session. A running task is cancelled and allowed to unwind first,
   * so the final status is `finished` rather than `cancelled`.
   *
   * @returns The updated session, or null if not found
   */
  async finishSession(sessionId: string): Promise<SessionRecord | null> {
    const session = await this.persistence.getSession(sessionId);
    if (!session) {
      return null;
    }

    await this.supervisor.cancelAndWait(sessionId, 'finished');

    await this.persistence.updateSessionStatus(sessionId, 'finished');
    this.eventBus.emit('session:status', { sessionId, status: 'finished' });
    logger.info({ sessionId }, 'Session finished');

    return { ...session, status: 'finished' };
  }

  /**
   * Delete a session and all its messages, stopping its run first.
   *
   * @returns false if the session does not exist
   */
  async deleteSession(sessionId: string): Promise<boolean> {
    const session = await this.persistence.getSession(sessionId);
    if (!session) {
      return false;
    }

    await this.supervisor.cancelAndWait(sessionId, 'deleted');

    await this.persistence.deleteMessagesForSession(sessionId);
    await this.persistence.deleteSession(sessionId);
    logger.info({ sessionId }, 'Session deleted');

    return true;
  }
}

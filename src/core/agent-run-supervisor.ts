/**
 * AgentRunSupervisor - starts and cancels runs
 *
 * Guarantees one registry entry per running session and flush-on-cancel.
 * Runs are scheduled as independent promise chains; `start` never waits for one.
 */

import { randomUUID } from 'crypto';
import { logger } from '../config/logger.js';
import { RunCancelledError, getErrorMessage } from '../lib/errors.js';
import type { PersistenceAdapter } from '../types/persistence-adapter.js';
import type { LiveConnection } from '../types/stream-events.js';
import type { AgentRunController } from './agent-run-controller.js';
import type { EventBus } from './event-bus.js';
import { DEFAULT_BATCH_SIZE, MessageBuffer } from './message-buffer.js';
import type { RunHandle, RunOutcome } from './run-handle.js';
import type { SessionTaskRegistry } from './session-task-registry.js';

export interface StartRunArgs {
  sessionId: string;
  message: string;
  persistence: PersistenceAdapter;
  connection?: LiveConnection;
  credential?: string;
}

export class AgentRunSupervisor {
  constructor(
    private readonly controller: AgentRunController,
    private readonly registry: SessionTaskRegistry,
    private readonly eventBus: EventBus,
    private readonly batchSize: number = DEFAULT_BATCH_SIZE,
  ) {}

  /**
   * Schedule a run and register it. Returns before the run does any work.
   *
   * Callers check `isActive` first; starting over an active run replaces its
   * registry entry without stopping it.
   */
  start(args: StartRunArgs): RunHandle {
    const { sessionId, persistence } = args;

    if (this.registry.isActive(sessionId)) {
      logger.warn({ sessionId }, 'Starting a run while another is registered for this session');
    }

    const runId = randomUUID();
    const abortController = new AbortController();
    const buffer = new MessageBuffer(sessionId, persistence, this.batchSize);

    let handle: RunHandle;

    // Deferred one microtask so the entry is registered before the run can deregister it
    const done: Promise<RunOutcome> = Promise.resolve()
      .then(() =>
        this.controller.execute({
          handle,
          message: args.message,
          persistence,
          buffer,
          connection: args.connection,
          credential: args.credential,
        }),
      )
      .catch((error: unknown): RunOutcome => {
        if (error instanceof RunCancelledError) {
          return { status: 'cancelled', reason: error.reason };
        }
        logger.error({ error, sessionId, runId }, 'Run exited with an unhandled error');
        return { status: 'error', error: getErrorMessage(error) };
      })
      .then((outcome) => {
        this.eventBus.emit('run:ended', { sessionId, runId, outcome });
        return outcome;
      });

    handle = {
      sessionId,
      runId,
      signal: abortController.signal,
      done,
      cancel: (reason?: string) => abortController.abort(reason ?? 'cancelled'),
    };

    this.registry.register(sessionId, { handle, buffer, persistence });
    this.eventBus.emit('run:started', { sessionId, runId });
    logger.info({ sessionId, runId }, 'Run scheduled');

    return handle;
  }

  /**
   * Signal cancellation and drain whatever the run has buffered.
   *
   * The drain is best-effort; the run's own cancellation path performs the
   * final flush and status write.
   *
   * @returns false when the session has no active run
   */
  async cancel(sessionId: string, reason?: string): Promise<boolean> {
    const entry = this.registry.lookup(sessionId);
    if (!entry) {
      return false;
    }

    entry.handle.cancel(reason);
    logger.info({ sessionId, runId: entry.handle.runId }, 'Run cancellation requested');

    try {
      await entry.buffer.flush();
    } catch (error) {
      logger.warn({ error, sessionId, unflushed: entry.buffer.size }, 'Best-effort flush on cancel failed');
    }

    return true;
  }

  /**
   * Cancel the run (if any) and wait until it has fully exited
   */
  async cancelAndWait(sessionId: string, reason?: string): Promise<RunOutcome | null> {
    const entry = this.registry.lookup(sessionId);
    if (!entry) {
      return null;
    }
    await this.cancel(sessionId, reason);
    return entry.handle.done;
  }

  /**
   * Handle of the session's active run, if any
   */
  getRun(sessionId: string): RunHandle | undefined {
    return this.registry.lookup(sessionId)?.handle;
  }

  isActive(sessionId: string): boolean {
    return this.registry.isActive(sessionId);
  }

  activeSessionIds(): string[] {
    return this.registry.activeSessionIds();
  }

  /**
   * Cancel every active run and wait for all of them to exit
   */
  async shutdown(): Promise<void> {
    const sessionIds = this.registry.activeSessionIds();
    logger.info({ activeCount: sessionIds.length }, 'Cancelling active runs...');
    await Promise.all(sessionIds.map((sessionId) => this.cancelAndWait(sessionId, 'shutdown')));
  }
}

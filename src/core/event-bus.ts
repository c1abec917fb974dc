/**
 * Event Bus - Centralized domain events
 *
 * Decouples run orchestration from the transport layer: the controller and
 * supervisor emit here, the WebSocket bridge listens.
 */

import { EventEmitter } from 'events';
import type { SessionStatus } from '../types/session.js';
import type { RunOutcome } from './run-handle.js';

/**
 * Domain events emitted by business logic
 */
export interface DomainEvents {
  /** Session status persisted */
  'session:status': {
    sessionId: string;
    status: SessionStatus;
  };

  /** Run registered and scheduled */
  'run:started': {
    sessionId: string;
    runId: string;
  };

  /** Run fully exited and deregistered */
  'run:ended': {
    sessionId: string;
    runId: string;
    outcome: RunOutcome;
  };
}

/**
 * Type-safe EventBus for domain events
 *
 * Usage:
 * ```typescript
 * const eventBus = new EventBus();
 *
 * eventBus.on('session:status', (data) => {
 *   console.log(data.sessionId, data.status);
 * });
 * ```
 */
export class EventBus extends EventEmitter {
  override emit<K extends keyof DomainEvents>(event: K, data: DomainEvents[K]): boolean {
    return super.emit(event, data);
  }

  override on<K extends keyof DomainEvents>(
    event: K,
    listener: (data: DomainEvents[K]) => void
  ): this {
    return super.on(event, listener);
  }

  override once<K extends keyof DomainEvents>(
    event: K,
    listener: (data: DomainEvents[K]) => void
  ): this {
    return super.once(event, listener);
  }

  override off<K extends keyof DomainEvents>(
    event: K,
    listener: (data: DomainEvents[K]) => void
  ): this {
    return super.off(event, listener);
  }

  override removeAllListeners(event?: keyof DomainEvents): this {
    return super.removeAllListeners(event);
  }
}

/**
 * In-process fakes shared by the test suites
 */

import { InMemoryPersistenceAdapter } from '../lib/persistence/in-memory-adapter.js';
import type { AgentEngine, AgentRunConfig, AgentRunHooks, ConversationMessage } from '../lib/agent-engine/base.js';
import { DEFAULT_SCREENSHOT_POLICY, type PendingMessage, type SessionRecord, type SessionStatus } from '../types/session.js';
import type { LiveConnection, StreamFrame } from '../types/stream-events.js';

/**
 * In-memory store that records every bulk insert and status write
 */
export class RecordingPersistence extends InMemoryPersistenceAdapter {
  readonly bulkInserts: PendingMessage[][] = [];
  readonly statusUpdates: SessionStatus[] = [];
  /** Number of upcoming bulk inserts to reject */
  failBulkInserts = 0;

  override async bulkInsertMessages(sessionId: string, records: PendingMessage[]): Promise<void> {
    if (this.failBulkInserts > 0) {
      this.failBulkInserts--;
      throw new Error('store unavailable');
    }
    this.bulkInserts.push(records.map((record) => ({ ...record })));
    await super.bulkInsertMessages(sessionId, records);
  }

  override async updateSessionStatus(sessionId: string, status: SessionStatus): Promise<void> {
    this.statusUpdates.push(status);
    await super.updateSessionStatus(sessionId, status);
  }

  /** Every bulk-inserted payload, parsed, in commit order */
  insertedContents(): unknown[] {
    return this.bulkInserts.flat().map((record) => JSON.parse(record.content));
  }
}

export type EngineScript = (
  hooks: AgentRunHooks,
  signal: AbortSignal,
  config: AgentRunConfig,
) => Promise<void>;

/**
 * Engine that plays a test-provided script
 */
export class ScriptedEngine implements AgentEngine {
  calls = 0;
  lastConfig?: AgentRunConfig;
  lastConversation?: ConversationMessage[];

  constructor(private readonly script: EngineScript = async () => {}) {}

  async run(args: {
    conversation: ConversationMessage[];
    hooks: AgentRunHooks;
    config: AgentRunConfig;
    signal: AbortSignal;
  }): Promise<void> {
    this.calls++;
    this.lastConfig = args.config;
    this.lastConversation = args.conversation;
    await this.script(args.hooks, args.signal, args.config);
  }
}

export class RecordingConnection implements LiveConnection {
  readonly frames: StreamFrame[] = [];

  send(frame: StreamFrame): void {
    this.frames.push(frame);
  }

  types(): string[] {
    return this.frames.map((frame) => frame.type);
  }
}

/**
 * Resolves once the signal is aborted
 */
export function waitForAbort(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

export function makeSession(overrides: Partial<SessionRecord> = {}): SessionRecord {
  return {
    id: 'session-1',
    status: 'active',
    createdAt: 1_700_000_000_000,
    ...DEFAULT_SCREENSHOT_POLICY,
    ...overrides,
  };
}

export function textBlock(text: string): { type: 'text'; text: string } {
  return { type: 'text', text };
}

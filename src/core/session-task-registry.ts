import type { PersistenceAdapter } from '../types/persistence-adapter.js';
import type { MessageBuffer } from './message-buffer.js';
import type { RunHandle } from './run-handle.js';

export interface RegistryEntry {
  handle: RunHandle;
  buffer: MessageBuffer;
  persistence: PersistenceAdapter;
}

/**
 * Table of running tasks keyed by session id.
 *
 * The single source of truth for "is this session executing". One instance is
 * owned by the runtime and passed to whoever starts, cancels or queries runs.
 * Every method is synchronous, so starts, cancels and run exits never
 * interleave inside an access.
 */
export class SessionTaskRegistry {
  private readonly entries = new Map<string, RegistryEntry>();

  /**
   * Insert an entry. Overwrites an existing one; callers check `isActive` first.
   */
  register(sessionId: string, entry: RegistryEntry): void {
    this.entries.set(sessionId, entry);
  }

  isActive(sessionId: string): boolean {
    return this.entries.has(sessionId);
  }

  lookup(sessionId: string): RegistryEntry | undefined {
    return this.entries.get(sessionId);
  }

  /**
   * Remove the entry for a session. No-op when missing.
   * With a handle, only removes the entry if it still belongs to that run.
   */
  unregister(sessionId: string, handle?: RunHandle): void {
    const entry = this.entries.get(sessionId);
    if (!entry) {
      return;
    }
    if (handle && entry.handle !== handle) {
      return;
    }
    this.entries.delete(sessionId);
  }

  activeSessionIds(): string[] {
    return Array.from(this.entries.keys());
  }

  get size(): number {
    return this.entries.size;
  }
}

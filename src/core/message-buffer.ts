import { logger } from '../config/logger.js';
import { SerialQueue } from '../lib/helpers/serial-queue.js';
import type { PersistenceAdapter } from '../types/persistence-adapter.js';
import type { PendingMessage } from '../types/session.js';

export const DEFAULT_BATCH_SIZE = 10;

/**
 * Ordered, in-memory sequence of a run's not-yet-persisted messages.
 *
 * Owned by exactly one run. The run appends and flushes; a concurrent cancel
 * may drain it. Both go through one queue so a drain never interleaves with
 * an append or another flush.
 */
export class MessageBuffer {
  private pending: PendingMessage[] = [];
  private readonly queue = new SerialQueue();

  constructor(
    public readonly sessionId: string,
    private readonly persistence: PersistenceAdapter,
    public readonly batchSize: number = DEFAULT_BATCH_SIZE,
  ) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new Error(`Batch size must be a positive integer, got ${batchSize}`);
    }
  }

  /** Number of records waiting to be written */
  get size(): number {
    return this.pending.length;
  }

  /** Serialized payloads waiting to be written, oldest first */
  pendingContents(): string[] {
    return this.pending.map((record) => record.content);
  }

  /**
   * Add one serialized event to the tail. Flushes once the batch size is reached.
   */
  append(content: string, createdAt: number = Date.now()): Promise<void> {
    return this.queue.run(async () => {
      this.pending.push({ content, createdAt });
      if (this.pending.length >= this.batchSize) {
        await this.writePending();
      }
    });
  }

  /**
   * Write everything buffered in one bulk insert, then clear. No store call when empty.
   */
  flush(): Promise<void> {
    return this.queue.run(() => this.writePending());
  }

  private async writePending(): Promise<void> {
    if (this.pending.length === 0) {
      return;
    }

    const batch = this.pending;
    this.pending = [];

    try {
      await this.persistence.bulkInsertMessages(this.sessionId, batch);
      logger.debug({ sessionId: this.sessionId, count: batch.length }, 'Flushed message batch');
    } catch (error) {
      // Put the batch back ahead of anything appended since, keeping order
      this.pending = [...batch, ...this.pending];
      throw error;
    }
  }
}

import { logger } from '../config/logger.js';
import type { LiveConnection, StreamFrame, StreamFrameType } from '../types/stream-events.js';

/**
 * Forwards run events to the attached live client, if any.
 *
 * A failed send is logged and swallowed: persistence proceeds whether or not
 * anyone is watching.
 */
export class StreamRelay {
  constructor(
    private readonly sessionId: string,
    private readonly connection?: LiveConnection,
  ) {}

  get isAttached(): boolean {
    return this.connection !== undefined;
  }

  async relay(type: StreamFrameType, content: unknown): Promise<void> {
    if (!this.connection) {
      return;
    }

    const frame: StreamFrame = {
      type,
      content,
      timestamp: new Date().toISOString(),
    };

    try {
      await this.connection.send(frame);
    } catch (error) {
      logger.warn({ error, sessionId: this.sessionId, frameType: type }, 'Failed to relay frame to live connection');
    }
  }
}

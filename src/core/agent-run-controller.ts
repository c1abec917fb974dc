/**
 * AgentRunController - drives one run of the agent engine for a session
 *
 * Responsibilities:
 * - Mark the session running (committed immediately, not batched)
 * - Wire engine hooks into the StreamRelay (live) and MessageBuffer (batched)
 * - Resolve the terminal status from the engine outcome
 * - Flush the buffer and deregister on every exit path
 */

import { logger } from '../config/logger.js';
import type { AgentEngine, AgentRunHooks, ConversationMessage } from '../lib/agent-engine/base.js';
import { MissingCredentialError, RunCancelledError, getErrorMessage } from '../lib/errors.js';
import { resizeScreenshot } from '../lib/helpers/screenshot.js';
import type { PersistenceAdapter } from '../types/persistence-adapter.js';
import type { SessionRecord, SessionStatus } from '../types/session.js';
import type {
  AgentContentBlock,
  AgentToolResult,
  LiveConnection,
  StreamFrameType,
  ToolResultRecord,
} from '../types/stream-events.js';
import type { EventBus } from './event-bus.js';
import type { MessageBuffer } from './message-buffer.js';
import type { RunHandle, RunOutcome } from './run-handle.js';
import type { SessionTaskRegistry } from './session-task-registry.js';
import { StreamRelay } from './stream-relay.js';

export interface AgentRunControllerConfig {
  /** Used when the run request carries no credential */
  apiKey?: string;
  model: string;
  maxTurns?: number;
}

export interface ExecuteRunArgs {
  handle: RunHandle;
  message: string;
  persistence: PersistenceAdapter;
  buffer: MessageBuffer;
  connection?: LiveConnection;
  credential?: string;
}

/**
 * Frame type for a content block. Anything unrecognised is relayed as text.
 */
export function frameTypeForBlock(block: AgentContentBlock): StreamFrameType {
  switch (block.type) {
    case 'text':
    case 'tool_use':
    case 'thinking':
      return block.type;
    case 'redacted_thinking':
      return 'thinking';
    default:
      return 'text';
  }
}

/**
 * Build the hooks for one run. Each hook relays first, then buffers.
 */
export function createRunHooks(args: {
  session: SessionRecord;
  relay: StreamRelay;
  buffer: MessageBuffer;
}): AgentRunHooks {
  const { session, relay, buffer } = args;

  return {
    async onContent(block: AgentContentBlock): Promise<void> {
      await relay.relay(frameTypeForBlock(block), block);
      await buffer.append(JSON.stringify(block));
    },

    async onToolResult(result: AgentToolResult, toolId: string): Promise<void> {
      const output = result.output ?? null;
      const error = result.error ?? null;

      await relay.relay('tool_result', { tool_id: toolId, output, error });

      const record: ToolResultRecord = {
        type: 'tool_result',
        tool_id: toolId,
        output,
        error,
      };

      if (session.storeScreenshots && result.base64Image) {
        record.screenshot = await resizeScreenshot(
          result.base64Image,
          session.screenshotScale,
          session.screenshotQuality,
        );
      }

      await buffer.append(JSON.stringify(record));
    },

    onApiExchange(): void {
      // Reserved for diagnostics
    },
  };
}

export class AgentRunController {
  constructor(
    private readonly engine: AgentEngine,
    private readonly registry: SessionTaskRegistry,
    private readonly eventBus: EventBus,
    private readonly config: AgentRunControllerConfig,
  ) {}

  /**
   * Execute one complete run.
   *
   * Resolves with `completed`, `error` or `not_found`. Throws
   * `RunCancelledError` after cleanup when the run was cancelled.
   */
  async execute(args: ExecuteRunArgs): Promise<RunOutcome> {
    const { handle, message, persistence, buffer, connection, credential } = args;
    const { sessionId, runId, signal } = handle;

    try {
      const session = await persistence.getSession(sessionId);
      if (!session) {
        logger.warn({ sessionId, runId }, 'Session not found, run aborted');
        return { status: 'not_found' };
      }

      await this.setStatus(persistence, sessionId, 'running');
      logger.info({ sessionId, runId }, 'Run started');

      const relay = new StreamRelay(sessionId, connection);
      const conversation: ConversationMessage[] = [
        { role: 'user', content: [{ type: 'text', text: message }] },
      ];

      try {
        await buffer.append(JSON.stringify({ type: 'text', text: message, role: 'user' }));

        const apiKey = credential || this.config.apiKey;
        if (!apiKey) {
          throw new MissingCredentialError();
        }

        // Checkpoint: a cancel may land before the engine is ever invoked
        this.throwIfCancelled(handle);

        await this.engine.run({
          conversation,
          hooks: createRunHooks({ session, relay, buffer }),
          config: { apiKey, model: this.config.model, maxTurns: this.config.maxTurns },
          signal,
        });

        this.throwIfCancelled(handle);
      } catch (error) {
        if (signal.aborted || error instanceof RunCancelledError) {
          await this.flushQuietly(buffer, handle);
          await this.setStatus(persistence, sessionId, 'cancelled');
          logger.info({ sessionId, runId }, 'Run cancelled');
          throw error instanceof RunCancelledError ? error : new RunCancelledError(sessionId, reasonOf(signal));
        }

        await this.flushQuietly(buffer, handle);
        await this.setStatus(persistence, sessionId, 'error');
        const errorMessage = getErrorMessage(error);
        logger.error({ error, sessionId, runId }, 'Run failed');
        await relay.relay('error', { error: errorMessage });
        return { status: 'error', error: errorMessage };
      }

      await this.flushQuietly(buffer, handle);
      await this.setStatus(persistence, sessionId, 'completed');
      logger.info({ sessionId, runId }, 'Run completed');
      await relay.relay('completed', { message: 'Task completed' });
      return { status: 'completed' };
    } finally {
      this.registry.unregister(sessionId, handle);
    }
  }

  private throwIfCancelled(handle: RunHandle): void {
    if (handle.signal.aborted) {
      throw new RunCancelledError(handle.sessionId, reasonOf(handle.signal));
    }
  }

  private async setStatus(
    persistence: PersistenceAdapter,
    sessionId: string,
    status: SessionStatus,
  ): Promise<void> {
    await persistence.updateSessionStatus(sessionId, status);
    this.eventBus.emit('session:status', { sessionId, status });
  }

  /**
   * Terminal flush. A failing store must not keep the status from being written.
   * The buffer is discarded with the run, so the unwritten records go to the log.
   */
  private async flushQuietly(buffer: MessageBuffer, handle: RunHandle): Promise<void> {
    try {
      await buffer.flush();
    } catch (error) {
      logger.error(
        { error, sessionId: handle.sessionId, runId: handle.runId, unflushed: buffer.pendingContents() },
        'Failed to flush messages at end of run',
      );
    }
  }
}

function reasonOf(signal: AbortSignal): string | undefined {
  return typeof signal.reason === 'string' ? signal.reason : undefined;
}

import type { AgentContentBlock, AgentToolResult } from '../../types/stream-events.js';

/**
 * One message of the conversation handed to the engine
 */
export interface ConversationMessage {
  role: 'user' | 'assistant';
  content: { type: 'text'; text: string }[];
}

/**
 * Capabilities the engine calls back into while it runs.
 *
 * The engine awaits each hook before emitting the next event, which is what
 * keeps relay and buffer order identical to emit order.
 */
export interface AgentRunHooks {
  onContent(block: AgentContentBlock): Promise<void>;
  onToolResult(result: AgentToolResult, toolId: string): Promise<void>;
  /** Raw request/response observer. Reserved for diagnostics. */
  onApiExchange(request: unknown, response: unknown, error: unknown): void;
}

export interface AgentRunConfig {
  apiKey: string;
  model: string;
  maxTurns?: number;
}

/**
 * A long-running agent loop.
 *
 * `run` resolves when the agent finishes, rejects on failure, and is expected
 * to stop promptly once `signal` is aborted (rejecting or returning early).
 */
export interface AgentEngine {
  run(args: {
    conversation: ConversationMessage[];
    hooks: AgentRunHooks;
    config: AgentRunConfig;
    signal: AbortSignal;
  }): Promise<void>;
}

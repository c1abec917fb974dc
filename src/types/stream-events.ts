/**
 * Live stream frames pushed to an attached client during a run.
 */

export type StreamFrameType =
  | 'text'
  | 'tool_use'
  | 'tool_result'
  | 'thinking'
  | 'error'
  | 'completed';

export interface StreamFrame {
  type: StreamFrameType;
  content: unknown;
  /** ISO 8601 */
  timestamp: string;
}

/**
 * A content block emitted by the agent engine (text, tool_use, thinking, ...).
 * Only `type` is relied on; the block is otherwise passed through as-is.
 */
export interface AgentContentBlock {
  type: string;
}

/**
 * Result of one tool invocation inside the agent loop
 */
export interface AgentToolResult {
  output?: string | null;
  error?: string | null;
  /** Base64 encoded image (e.g. a screenshot) produced by the tool */
  base64Image?: string | null;
}

/**
 * Stored shape of a tool result message
 */
export interface ToolResultRecord {
  type: 'tool_result';
  tool_id: string;
  output: string | null;
  error: string | null;
  screenshot?: string;
}

/**
 * The initiating request a live client sends to start a run
 */
export interface RunRequest {
  sessionId: string;
  message: string;
  credential?: string;
}

/**
 * A channel delivering frames to one observing client.
 * `send` may throw or reject when the client is gone.
 */
export interface LiveConnection {
  send(frame: StreamFrame): void | Promise<void>;
}

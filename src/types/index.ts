/**
 * Public type exports
 */

export type { PersistenceAdapter } from './persistence-adapter.js';

export type {
  SessionStatus,
  ScreenshotPolicy,
  SessionRecord,
  MessageRecord,
  PendingMessage,
  CreateSessionArgs,
} from './session.js';
export { DEFAULT_SCREENSHOT_POLICY } from './session.js';

export type {
  StreamFrameType,
  StreamFrame,
  AgentContentBlock,
  AgentToolResult,
  ToolResultRecord,
  RunRequest,
  LiveConnection,
} from './stream-events.js';

export type {
  ServerToClientEvents,
  ClientToServerEvents,
  InterServerEvents,
  SocketData,
} from './events.js';

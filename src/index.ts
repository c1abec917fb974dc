/**
 * Agent run server - public API
 */

// Runtime
export { createAgentRunRuntime } from './runtime.js';
export type { AgentRunRuntime, AgentRunRuntimeConfig, AgentRunSocketServer } from './runtime.js';

// Core
export { MessageBuffer, DEFAULT_BATCH_SIZE } from './core/message-buffer.js';
export { StreamRelay } from './core/stream-relay.js';
export { SessionTaskRegistry, type RegistryEntry } from './core/session-task-registry.js';
export {
  AgentRunController,
  createRunHooks,
  frameTypeForBlock,
  type AgentRunControllerConfig,
  type ExecuteRunArgs,
} from './core/agent-run-controller.js';
export { AgentRunSupervisor, type StartRunArgs } from './core/agent-run-supervisor.js';
export { SessionService } from './core/session-service.js';
export { EventBus, type DomainEvents } from './core/event-bus.js';
export type { RunHandle, RunOutcome } from './core/run-handle.js';

// Agent engines
export type {
  AgentEngine,
  AgentRunConfig,
  AgentRunHooks,
  ConversationMessage,
} from './lib/agent-engine/base.js';
export { ClaudeAgentEngine, toToolResult } from './lib/agent-engine/claude-sdk/index.js';

// Persistence
export { SqlitePersistenceAdapter, InMemoryPersistenceAdapter } from './lib/persistence/index.js';

// Helpers and errors
export { resizeScreenshot } from './lib/helpers/screenshot.js';
export {
  RunCancelledError,
  MissingCredentialError,
  SessionNotFoundError,
  getErrorMessage,
} from './lib/errors.js';

// Transports
export { createRestServer, errorResponse } from './transport/rest/server.js';
export { createWebSocketServer } from './transport/websocket/index.js';

// Config
export { parseEnv, loadEnv, type Env } from './config/env.js';
export { logger } from './config/logger.js';

export * from './types/index.js';

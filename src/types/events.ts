/**
 * WebSocket Event Schema
 *
 * Event naming convention: resource:action
 *
 * - session:run    - client starts a run and becomes its live viewer
 * - session:frame  - one streamed frame of the run
 * - session:status - session status change (broadcast to the session room)
 */

import type { SessionStatus } from './session.js';
import type { RunRequest, StreamFrame } from './stream-events.js';

// ============================================================================
// Server → Client Events
// ============================================================================

export interface ServerToClientEvents {
  /**
   * Frame produced by the run this socket started
   */
  'session:frame': (frame: StreamFrame) => void;

  /**
   * Session status changed
   */
  'session:status': (data: { sessionId: string; status: SessionStatus }) => void;
}

// ============================================================================
// Client → Server Events
// ============================================================================

export interface ClientToServerEvents {
  /**
   * Start a run for a session. The socket receives its frames.
   */
  'session:run': (
    request: RunRequest,
    callback: (response: { success: boolean; runId?: string; error?: string }) => void
  ) => void;

  /**
   * Cancel the running task of a session
   */
  'session:cancel': (
    sessionId: string,
    callback: (response: { success: boolean; cancelled: boolean }) => void
  ) => void;
}

// ============================================================================
// Inter-Server Events
// ============================================================================

export interface InterServerEvents {
  // Reserved for multi-server coordination
}

// ============================================================================
// Socket Data (custom socket metadata)
// ============================================================================

export interface SocketData {
  sessionId?: string;
  /** Run started by this socket; cancelled when the socket disconnects */
  runId?: string;
  joinedAt?: number;
}

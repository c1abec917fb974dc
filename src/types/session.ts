/**
 * Session lifecycle status.
 *
 * `active → running → completed | error | cancelled`, and any status may move
 * to `finished` on an explicit close. Deletion removes the record entirely.
 */
export type SessionStatus =
  | 'active'
  | 'running'
  | 'completed'
  | 'error'
  | 'cancelled'
  | 'finished';

/**
 * Per-session policy for persisting screenshots carried by tool results
 */
export interface ScreenshotPolicy {
  storeScreenshots: boolean;
  /** Integer scale divisor: 1 = full size, 2 = half, 4 = quarter */
  screenshotScale: number;
  /** JPEG quality, 1-100 */
  screenshotQuality: number;
}

export const DEFAULT_SCREENSHOT_POLICY: ScreenshotPolicy = {
  storeScreenshots: false,
  screenshotScale: 2,
  screenshotQuality: 70,
};

export interface SessionRecord extends ScreenshotPolicy {
  id: string;
  status: SessionStatus;
  /** Epoch milliseconds */
  createdAt: number;
}

/**
 * A persisted message. `content` is the serialized event payload.
 */
export interface MessageRecord {
  id: number;
  sessionId: string;
  content: string;
  /** Epoch milliseconds */
  createdAt: number;
}

/**
 * A message captured during a run but not yet written to the store.
 * `createdAt` is stamped when the event is produced, not when it is flushed.
 */
export interface PendingMessage {
  content: string;
  /** Epoch milliseconds */
  createdAt: number;
}

export type CreateSessionArgs = Partial<ScreenshotPolicy>;

/**
 * How a run ended. `cancelled` is kept distinct from `error` so callers can
 * tell a stopped run from a failed one.
 */
export type RunOutcome =
  | { status: 'completed' }
  | { status: 'error'; error: string }
  | { status: 'cancelled'; reason?: string }
  | { status: 'not_found' };

/**
 * Handle to a scheduled run
 */
export interface RunHandle {
  readonly sessionId: string;
  readonly runId: string;
  readonly signal: AbortSignal;
  /** Settles once the run has fully exited and deregistered. Never rejects. */
  readonly done: Promise<RunOutcome>;
  /** Signal cancellation; the run unwinds at its next checkpoint */
  cancel(reason?: string): void;
}

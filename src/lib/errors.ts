/**
 * Raised by a run after its cancellation cleanup, so whoever awaits the run
 * observes a cancellation and not a success.
 */
export class RunCancelledError extends Error {
  constructor(
    public readonly sessionId: string,
    public readonly reason?: string,
  ) {
    super(`Run for session ${sessionId} was cancelled${reason ? `: ${reason}` : ''}`);
    this.name = 'RunCancelledError';
  }
}

/**
 * No credential was supplied with the request and none is configured.
 */
export class MissingCredentialError extends Error {
  constructor() {
    super('No Anthropic API key provided');
    this.name = 'MissingCredentialError';
  }
}

export class SessionNotFoundError extends Error {
  constructor(public readonly sessionId: string) {
    super(`Session ${sessionId} not found`);
    this.name = 'SessionNotFoundError';
  }
}

/**
 * Extract error message from unknown error object
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Internal server error';
}

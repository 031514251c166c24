/** Thrown when an invalid agent loop state transition is attempted. */
export class InvalidStateTransitionError extends Error {
  constructor(
    public readonly from: string,
    public readonly to: string,
  ) {
    super(`Invalid state transition: ${from} → ${to}`);
    this.name = 'InvalidStateTransitionError';
  }
}

/** Thrown when tool results do not answer the calls of the current turn. */
export class ToolResultMismatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolResultMismatchError';
  }
}

/** Thrown when a session receives a new turn while one is still running. */
export class SessionBusyError extends Error {
  constructor() {
    super('Session is already running a turn');
    this.name = 'SessionBusyError';
  }
}

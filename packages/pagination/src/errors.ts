/**
 * Pagination Error Types
 *
 * Two kinds of failure:
 *
 * **Thrown (caller bug):** PaginationProgrammingError and SessionDisposedError mean
 * the session was built or used in a way that can never succeed.
 *
 * **Returned (runtime condition):** SessionInactiveError, UnsupportedCapabilityError
 * and CleanupTransportError travel inside result objects. They are logged and
 * reported, and never cross the timer or event boundary as exceptions.
 */

export class PaginationProgrammingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PaginationProgrammingError';
  }
}

export class SessionInactiveError extends Error {
  readonly sessionId: string;
  constructor(sessionId: string) {
    super(`Pagination session ${sessionId} is no longer active`);
    this.name = 'SessionInactiveError';
    this.sessionId = sessionId;
  }
}

export class SessionDisposedError extends Error {
  readonly sessionId: string;
  constructor(sessionId: string) {
    super(`Pagination session ${sessionId} has been disposed`);
    this.name = 'SessionDisposedError';
    this.sessionId = sessionId;
  }
}

export class UnsupportedCapabilityError extends Error {
  readonly capability: string;
  constructor(capability: string, message: string) {
    super(message);
    this.name = 'UnsupportedCapabilityError';
    this.capability = capability;
  }
}

export class CleanupTransportError extends Error {
  readonly operation: string;
  constructor(operation: string, cause: unknown) {
    super(`Remote call ${operation} failed`, { cause });
    this.name = 'CleanupTransportError';
    this.operation = operation;
  }
}

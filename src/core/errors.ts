/**
 * Base error class for all application errors.
 * Provides an optional error code for programmatic handling.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * Error raised by an action that cannot complete against the current
 * session state (e.g., empty item sequence, index out of range).
 * The session is left unchanged.
 */
export class ActionError extends AppError {
  constructor(detail: string) {
    super(detail, 'ACTION_ERROR');
    this.name = 'ActionError';
  }
}

/**
 * Error for an unknown action, session or input token.
 * Callers surface it as "no matching action", never as a fault.
 */
export class NotFoundError extends AppError {
  constructor(kind: 'action' | 'session' | 'binding' | 'tool', id: string) {
    super(`Unknown ${kind}: ${id}`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

/**
 * Error thrown when a session-related operation fails
 * (e.g., duplicate session id, operation on an evicted session).
 */
export class SessionError extends AppError {
  constructor(detail: string) {
    super(detail, 'SESSION_ERROR');
    this.name = 'SessionError';
  }
}

/**
 * Error thrown when invalid arguments are passed to an action or API method
 * (e.g., wrong type, out of range, missing required field).
 */
export class ValidationError extends AppError {
  constructor(detail: string) {
    super(detail, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

/**
 * Error reported by an external collaborator: a tool exiting with an
 * unexpected code, an unwritable log file, a failed trash move.
 * Carries the collaborator's diagnostic output verbatim when there is one.
 */
export class CollaboratorError extends AppError {
  constructor(
    detail: string,
    public readonly stderr?: string
  ) {
    super(detail, 'COLLABORATOR_ERROR');
    this.name = 'CollaboratorError';
  }
}

/**
 * Error thrown when configuration cannot be loaded or has the wrong shape.
 */
export class ConfigError extends AppError {
  constructor(detail: string) {
    super(detail, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

/**
 * Internal defect: a session invariant (index bounds, permutation shape,
 * speed range) would be broken by a commit. Never converted into a
 * user-facing result.
 */
export class InvariantError extends AppError {
  constructor(detail: string) {
    super(detail, 'INVARIANT_VIOLATION');
    this.name = 'InvariantError';
  }
}

/** Extract a printable message from anything thrown. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

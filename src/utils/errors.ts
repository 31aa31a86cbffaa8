// Utilities: Custom error types

export class GameEngineError extends Error {
  statusCode = 400;
  code = 'GAME_ENGINE_ERROR';
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'GameEngineError';
    this.details = details;
  }
}

export class NotFoundError extends GameEngineError {
  statusCode = 404;
  code = 'NOT_FOUND';

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.name = 'NotFoundError';
  }
}

/**
 * Wrong turn, or an action the combatant's status does not permit.
 * `forceApplyAvailable` tells a DM caller the same request may be resent with `force`.
 */
export class IllegalActionError extends GameEngineError {
  statusCode = 409;
  code = 'ILLEGAL_ACTION';
  forceApplyAvailable = false;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.name = 'IllegalActionError';
  }
}

export class ConcurrencyConflictError extends GameEngineError {
  statusCode = 409;
  code = 'CONCURRENCY_CONFLICT';

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.name = 'ConcurrencyConflictError';
  }
}

export class PersistenceFailureError extends GameEngineError {
  statusCode = 503;
  code = 'PERSISTENCE_FAILURE';

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.name = 'PersistenceFailureError';
  }
}

export class ValidationError extends GameEngineError {
  statusCode = 400;
  code = 'VALIDATION_ERROR';

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.name = 'ValidationError';
  }
}

export class AuthorizationError extends GameEngineError {
  statusCode = 403;
  code = 'FORBIDDEN';

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.name = 'AuthorizationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

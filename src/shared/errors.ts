export type GovernanceErrorCode =
  | 'validation_failed'
  | 'unauthorized'
  | 'not_found'
  | 'state_conflict';

/**
 * Base class for every abort raised by the engine. An operation that throws
 * one of these has committed nothing.
 */
export class GovernanceError extends Error {
  constructor(
    public readonly code: GovernanceErrorCode,
    message: string,
    public readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'GovernanceError';
  }
}

export class ValidationError extends GovernanceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('validation_failed', message, details);
    this.name = 'ValidationError';
  }
}

export class AuthorizationError extends GovernanceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('unauthorized', message, details);
    this.name = 'AuthorizationError';
  }
}

export class NotFoundError extends GovernanceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('not_found', message, details);
    this.name = 'NotFoundError';
  }
}

export class StateConflictError extends GovernanceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('state_conflict', message, details);
    this.name = 'StateConflictError';
  }
}

const STATUS_BY_CODE: Record<GovernanceErrorCode, number> = {
  validation_failed: 400,
  unauthorized: 403,
  not_found: 404,
  state_conflict: 409,
};

export function httpStatusFor(err: GovernanceError): number {
  return STATUS_BY_CODE[err.code];
}

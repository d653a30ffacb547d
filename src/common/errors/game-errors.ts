import { HttpStatus } from '@nestjs/common';

export class GameError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly httpStatus: number = HttpStatus.INTERNAL_SERVER_ERROR,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'GameError';
  }
}

export class BadRequestError extends GameError {
  constructor(message = 'Bad request', details?: Record<string, unknown>) {
    super('BAD_REQUEST', message, HttpStatus.BAD_REQUEST, details);
  }
}

export class NotFoundError extends GameError {
  constructor(message = 'Not found', details?: Record<string, unknown>) {
    super('NOT_FOUND', message, HttpStatus.NOT_FOUND, details);
  }
}

export class UnauthorizedError extends GameError {
  constructor(message = 'Unauthorized', details?: Record<string, unknown>) {
    super('UNAUTHORIZED', message, HttpStatus.UNAUTHORIZED, details);
  }
}

export class ForbiddenError extends GameError {
  constructor(message = 'Forbidden', details?: Record<string, unknown>) {
    super('FORBIDDEN', message, HttpStatus.FORBIDDEN, details);
  }
}

export class TurnConflictError extends GameError {
  constructor(
    code: 'TURN_IN_PROGRESS' | 'TURN_CANCELLED' = 'TURN_IN_PROGRESS',
    message = 'A turn is already being processed',
    details?: Record<string, unknown>,
  ) {
    super(code, message, HttpStatus.CONFLICT, details);
  }
}

export class InvalidInputError extends GameError {
  constructor(message = 'Invalid input', details?: Record<string, unknown>) {
    super('INVALID_INPUT', message, 422, details);
  }
}

export class InternalError extends GameError {
  constructor(message = 'Internal error', details?: Record<string, unknown>) {
    super('INTERNAL_ERROR', message, HttpStatus.INTERNAL_SERVER_ERROR, details);
  }
}

// --- AI Gateway ---

export type GatewayErrorKind =
  | 'Timeout'
  | 'RateLimited'
  | 'ServiceUnavailable'
  | 'AuthFailure';

export class GatewayError extends GameError {
  constructor(
    public readonly kind: GatewayErrorKind,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super('GATEWAY_ERROR', message, HttpStatus.BAD_GATEWAY, { kind, ...details });
    this.name = 'GatewayError';
  }
}

// --- Model output rejected (hard validation errors) ---

/** Base for every error that rejects an effect proposal wholesale. */
export class ProposalRejectedError extends GameError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, 422, details);
    this.name = 'ProposalRejectedError';
  }
}

export class ParseError extends ProposalRejectedError {
  constructor(message = 'Model output could not be parsed', details?: Record<string, unknown>) {
    super('PARSE_ERROR', message, details);
    this.name = 'ParseError';
  }
}

export class EntityReferenceError extends ProposalRejectedError {
  constructor(message = 'Unknown entity reference', details?: Record<string, unknown>) {
    super('REFERENCE_ERROR', message, details);
    this.name = 'EntityReferenceError';
  }
}

export class IllegalTransitionError extends ProposalRejectedError {
  constructor(message = 'Illegal quest transition', details?: Record<string, unknown>) {
    super('ILLEGAL_TRANSITION', message, details);
    this.name = 'IllegalTransitionError';
  }
}

/** An intent passed validation but could not be applied to the working copy. */
export class EffectApplicationError extends ProposalRejectedError {
  constructor(message = 'Effect could not be applied', details?: Record<string, unknown>) {
    super('EFFECT_REJECTED', message, details);
    this.name = 'EffectApplicationError';
  }
}

// --- Persistence / configuration ---

export class PersistenceError extends GameError {
  constructor(
    message = 'Save or load failed',
    details?: Record<string, unknown>,
  ) {
    super('PERSISTENCE_ERROR', message, HttpStatus.SERVICE_UNAVAILABLE, details);
    this.name = 'PersistenceError';
  }
}

export class ConfigurationError extends GameError {
  constructor(message = 'Invalid configuration', details?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', message, HttpStatus.INTERNAL_SERVER_ERROR, details);
    this.name = 'ConfigurationError';
  }
}

import { StatusCodes } from 'http-status-codes';

export class EventSuiteError extends Error {
  constructor(
    public readonly message: string,
    public readonly code = 'INTERNAL_ERROR',
    public readonly statusCode: number = StatusCodes.BAD_REQUEST,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'EventSuiteError';
  }
}

export class NotFoundError extends EventSuiteError {
  constructor(message = 'Resource not found', details?: unknown) {
    super(message, 'NOT_FOUND', StatusCodes.NOT_FOUND, details);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends EventSuiteError {
  constructor(message = 'Validation failed', details?: unknown) {
    super(message, 'VALIDATION_ERROR', StatusCodes.BAD_REQUEST, details);
    this.name = 'ValidationError';
  }
}

/**
 * A write that would break a uniqueness or referential rule: duplicate
 * assignment, full host, host still in use.
 */
export class ConflictError extends EventSuiteError {
  constructor(message = 'Conflicting state', details?: unknown) {
    super(message, 'CONFLICT', StatusCodes.BAD_REQUEST, details);
    this.name = 'ConflictError';
  }
}

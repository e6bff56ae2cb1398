import type { ErrorCode, ServiceResult } from '../types/db.js';
import { fail } from '../types/db.js';
import { logger } from './logger.js';

/**
 * Base operational error class. Operational errors are expected conditions
 * (bad input, not found, conflicts) vs programmer errors (bugs).
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode;
  public readonly isOperational = true;

  constructor(statusCode: number, message: string, code?: ErrorCode) {
    super(message);
    this.statusCode = statusCode;
    this.code = code || 'INTERNAL_ERROR';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotFoundError extends AppError {
  constructor(resource = 'Resource') {
    super(404, `${resource} not found`, 'NOT_FOUND');
  }
}

export class ConflictError extends AppError {
  constructor(message = 'Resource conflict', code: ErrorCode = 'CONFLICT') {
    super(409, message, code);
  }
}

export class ValidationError extends AppError {
  public readonly details?: unknown;

  constructor(message = 'Validation failed', details?: unknown) {
    super(400, message, 'VALIDATION_ERROR');
    this.details = details;
  }
}

/** End of a time range is not after its start. */
export class InvalidRangeError extends AppError {
  constructor(message = 'End time must be after start time') {
    super(400, message, 'INVALID_RANGE');
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Authentication required') {
    super(401, message, 'UNAUTHORIZED');
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Insufficient permissions') {
    super(403, message, 'FORBIDDEN');
  }
}

/**
 * Convert a caught error into a failed ServiceResult. Operational errors keep
 * their status and code; anything else is logged and reported as a 500.
 */
export function toServiceFailure<T = never>(err: unknown, context: string): ServiceResult<T> {
  if (err instanceof AppError) {
    return fail(err.statusCode, err.message, err.code);
  }
  logger.error({ err }, context);
  return fail(500, 'Internal server error', 'INTERNAL_ERROR');
}

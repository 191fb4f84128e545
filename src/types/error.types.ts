/**
 * Error types and codes
 */

// Standard error codes
export enum ErrorCode {
  // Validation errors (400)
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_INTERVAL = 'INVALID_INTERVAL',
  DURATION_TOO_SHORT = 'DURATION_TOO_SHORT',
  INVALID_RESOURCE_NAME = 'INVALID_RESOURCE_NAME',
  MISSING_CALLER = 'MISSING_CALLER',

  // Economic errors (402)
  INSUFFICIENT_FUNDS = 'INSUFFICIENT_FUNDS',
  INSUFFICIENT_BALANCE = 'INSUFFICIENT_BALANCE',

  // Authorization errors (403)
  UNAUTHORIZED = 'UNAUTHORIZED',

  // Not found errors (404)
  NOT_FOUND = 'NOT_FOUND',
  ACCOUNT_NOT_FOUND = 'ACCOUNT_NOT_FOUND',
  RESOURCE_NOT_FOUND = 'RESOURCE_NOT_FOUND',
  BOOKING_NOT_FOUND = 'BOOKING_NOT_FOUND',
  ATTEMPT_NOT_FOUND = 'ATTEMPT_NOT_FOUND',

  // Conflict errors (409)
  BOOKING_COLLISION = 'BOOKING_COLLISION',
  BOOKING_ALREADY_STARTED = 'BOOKING_ALREADY_STARTED',
  NAME_TAKEN = 'NAME_TAKEN',
  ALREADY_INITIALIZED = 'ALREADY_INITIALIZED',
  NOT_INITIALIZED = 'NOT_INITIALIZED',
  ACCOUNT_EXISTS = 'ACCOUNT_EXISTS',

  // Fatal to the call (422)
  ARITHMETIC_OVERFLOW = 'ARITHMETIC_OVERFLOW',

  // Reported on a provisioning attempt, never thrown to the caller
  PROVISIONING_FAILED = 'PROVISIONING_FAILED',

  // Server errors (500)
  DATABASE_ERROR = 'DATABASE_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

// Custom application error class
export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * =============================================================================
 * APPLICATION ERROR CLASSES
 * =============================================================================
 *
 * Every expected failure is an AppError; errorHandler turns it into the
 * `{ success: false, error: { code, message, details } }` envelope.
 *
 * USAGE:
 * ```typescript
 * throw new NotFoundError('Deposit not found');
 * throw new ConflictError('OR code already used', ErrorCode.DUPLICATE_OR_CODE);
 * ```
 * =============================================================================
 */

import { DepositStatus, ErrorCode, HTTP_STATUS } from '../constants';

export type ErrorDetails = Record<string, unknown>;

/**
 * Base Application Error
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode;
  public readonly details?: ErrorDetails;

  constructor(message: string, statusCode: number, code: ErrorCode, details?: ErrorDetails) {
    super(message);

    this.statusCode = statusCode;
    this.code = code;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// =============================================================================
// HTTP ERRORS
// =============================================================================

export interface ValidationErrorDetail {
  field: string;
  message: string;
}

/**
 * 400 - request body, query or params failed their schema
 */
export class ValidationError extends AppError {
  public readonly errors: ValidationErrorDetail[];

  constructor(
    message: string = 'Validation failed',
    errors: ValidationErrorDetail[] = [],
    code: ErrorCode = ErrorCode.VALIDATION_ERROR
  ) {
    super(message, HTTP_STATUS.BAD_REQUEST, code, { errors });
    this.errors = errors;
  }

  static fromZodError(zodError: { errors: Array<{ path: (string | number)[]; message: string }> }): ValidationError {
    const errors = zodError.errors.map(err => ({
      field: err.path.join('.'),
      message: err.message
    }));
    return new ValidationError('Validation failed', errors);
  }
}

/** 401 */
export class UnauthorizedError extends AppError {
  constructor(message: string = 'Authentication required', code: ErrorCode = ErrorCode.UNAUTHORIZED) {
    super(message, HTTP_STATUS.UNAUTHORIZED, code);
  }
}

/** 403 */
export class ForbiddenError extends AppError {
  constructor(message: string = 'Insufficient permissions') {
    super(message, HTTP_STATUS.FORBIDDEN, ErrorCode.FORBIDDEN);
  }
}

/** 404 */
export class NotFoundError extends AppError {
  constructor(message: string = 'Resource not found', details?: ErrorDetails) {
    super(message, HTTP_STATUS.NOT_FOUND, ErrorCode.NOT_FOUND, details);
  }
}

/**
 * 409 - unique value taken, or a state change that already happened
 */
export class ConflictError extends AppError {
  constructor(message: string, code: ErrorCode = ErrorCode.CONFLICT, details?: ErrorDetails) {
    super(message, HTTP_STATUS.CONFLICT, code, details);
  }
}

/**
 * 422 - well-formed, but the vehicle or wallet state refuses it
 */
export class UnprocessableError extends AppError {
  constructor(message: string, code: ErrorCode, details?: ErrorDetails) {
    super(message, HTTP_STATUS.UNPROCESSABLE, code, details);
  }
}

// =============================================================================
// DOMAIN ERRORS
// =============================================================================

export class InvalidCredentialsError extends UnauthorizedError {
  constructor() {
    super('Invalid username or password', ErrorCode.INVALID_CREDENTIALS);
  }
}

export class DepositNotPendingError extends ConflictError {
  constructor(depositId: number, currentStatus: DepositStatus) {
    super(
      `Deposit has already been ${currentStatus}`,
      ErrorCode.DEPOSIT_NOT_PENDING,
      { depositId, currentStatus }
    );
  }
}

export class BalanceLimitError extends UnprocessableError {
  constructor(walletId: number) {
    super('Deposit would exceed the largest balance a wallet can hold', ErrorCode.BALANCE_LIMIT_EXCEEDED, { walletId });
  }
}

export class InsufficientBalanceError extends UnprocessableError {
  constructor(balance: number, required: number) {
    super(
      'Insufficient wallet balance for the terminal fee',
      ErrorCode.INSUFFICIENT_BALANCE,
      { balance, required }
    );
  }
}

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode: number, code: string, isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, this.constructor.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  public readonly details: unknown[];

  constructor(message: string, details: unknown[] = []) {
    super(message, 400, 'VALIDATION_ERROR');
    this.details = details;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id?: string | number) {
    const message =
      id !== undefined ? `${resource} with id '${id}' not found` : `${resource} not found`;
    super(message, 404, 'NOT_FOUND');
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, code = 'CONFLICT') {
    super(message, 409, code);
    Object.setPrototypeOf(this, ConflictError.prototype);
  }
}

export class InsufficientStockError extends ConflictError {
  public readonly ingredientId: number;
  public readonly available: number;
  public readonly requested: number;

  constructor(ingredientId: number, available: number, requested: number) {
    super(
      `Insufficient stock for ingredient ${ingredientId}: ${available} on hand, ${requested} required`,
      'INSUFFICIENT_STOCK'
    );
    this.ingredientId = ingredientId;
    this.available = available;
    this.requested = requested;
    Object.setPrototypeOf(this, InsufficientStockError.prototype);
  }
}

/**
 * Raised when the store rejects a statement on a uniqueness, foreign-key,
 * check or not-null constraint.
 */
export class ConstraintViolationError extends AppError {
  public readonly constraint: string;

  constructor(message: string, constraint: string) {
    super(message, 409, 'CONSTRAINT_VIOLATION');
    this.constraint = constraint;
    Object.setPrototypeOf(this, ConstraintViolationError.prototype);
  }
}

/**
 * An unclassified failure inside a transactional scope. Thrown only after the
 * scope has been rolled back.
 */
export class TransactionFailureError extends AppError {
  public readonly cause: unknown;

  constructor(message: string, cause: unknown) {
    super(message, 500, 'TRANSACTION_FAILED', false);
    this.cause = cause;
    Object.setPrototypeOf(this, TransactionFailureError.prototype);
  }
}

export class ConnectionUnavailableError extends AppError {
  constructor(message = 'No database connection available') {
    super(message, 503, 'CONNECTION_UNAVAILABLE');
    Object.setPrototypeOf(this, ConnectionUnavailableError.prototype);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

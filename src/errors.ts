/**
 * Error taxonomy shared by services, repositories and the HTTP layer.
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'INVALID_STATE'
  | 'STORAGE_UNAVAILABLE';

export class AppError extends Error {
  readonly code: ErrorCode;
  readonly httpStatus: number;
  readonly details?: unknown;

  constructor(code: ErrorCode, httpStatus: number, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.httpStatus = httpStatus;
    this.details = details;
  }
}

/** Bad input. Never retried. */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super('VALIDATION_ERROR', 400, message, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, details?: unknown) {
    super('NOT_FOUND', 404, message, details);
  }
}

/** The entity exists but its state forbids the operation (stale client state). */
export class InvalidStateError extends AppError {
  constructor(message: string, details?: unknown) {
    super('INVALID_STATE', 409, message, details);
  }
}

export class StorageError extends AppError {
  readonly transient: boolean;

  constructor(message: string, options: { transient?: boolean; cause?: unknown } = {}) {
    super('STORAGE_UNAVAILABLE', 503, message);
    this.transient = options.transient ?? true;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export function isTransientError(error: unknown): boolean {
  return error instanceof StorageError && error.transient;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

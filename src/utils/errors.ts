/**
 * Domain errors
 * Each carries a transport-agnostic kind and the HTTP status it maps to.
 */

export type ErrorKind = 'NOT_FOUND' | 'VALIDATION_ERROR' | 'CONFLICT' | 'STORAGE_ERROR';

export abstract class AppError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly statusCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends AppError {
  readonly kind = 'NOT_FOUND';
  readonly statusCode = 404;

  static of(entity: string, id: number): NotFoundError {
    return new NotFoundError(`${entity} with ID ${id} not found`);
  }
}

export class ValidationError extends AppError {
  readonly kind = 'VALIDATION_ERROR';
  readonly statusCode = 400;
}

export class ConflictError extends AppError {
  readonly kind = 'CONFLICT';
  readonly statusCode = 409;
}

export class StorageError extends AppError {
  readonly kind = 'STORAGE_ERROR';
  readonly statusCode = 500;
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

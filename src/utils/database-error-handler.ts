/**
 * Database Error Handler
 *
 * Translates PostgreSQL failures into domain errors so SQL text and schema
 * details never reach the client.
 */

import { AppError, ConflictError, ValidationError } from './errors';

const UNIQUE_VIOLATION = '23505';
const FOREIGN_KEY_VIOLATION = '23503';
const CHECK_VIOLATION = '23514';
const NUMERIC_VALUE_OUT_OF_RANGE = '22003';
const SERIALIZATION_FAILURE = '40001';
const DEADLOCK_DETECTED = '40P01';

export function pgErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  const { code } = error;
  return typeof code === 'string' ? code : undefined;
}

/**
 * True for conflicts that succeed when the transaction is simply replayed.
 */
export function isTransientDatabaseError(error: unknown): boolean {
  const code = pgErrorCode(error);
  return code === SERIALIZATION_FAILURE || code === DEADLOCK_DETECTED;
}

/**
 * Map constraint violations to domain errors; anything else is returned as-is.
 */
export function translateDatabaseError(error: unknown): unknown {
  if (error instanceof AppError) return error;

  switch (pgErrorCode(error)) {
    case UNIQUE_VIOLATION:
      return new ConflictError('This record already exists', { cause: error });
    case FOREIGN_KEY_VIOLATION:
      return new ValidationError('Invalid reference', { cause: error });
    case CHECK_VIOLATION:
      return new ValidationError('Record violates an ownership constraint', { cause: error });
    case NUMERIC_VALUE_OUT_OF_RANGE:
      return new ValidationError('Numeric value out of range', { cause: error });
    default:
      return error;
  }
}

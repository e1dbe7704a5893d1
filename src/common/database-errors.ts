import { QueryFailedError } from 'typeorm';

const UNIQUE_VIOLATION = '23505';
const SERIALIZATION_FAILURE = '40001';

function driverCode(error: unknown): string | undefined {
  if (!(error instanceof QueryFailedError)) {
    return undefined;
  }
  const driverError: unknown = error.driverError;
  if (typeof driverError === 'object' && driverError !== null && 'code' in driverError && typeof driverError.code === 'string') {
    return driverError.code;
  }
  return undefined;
}

/** True for PostgreSQL errors raised when a concurrent write claimed the same row or range first. */
export function isWriteConflict(error: unknown): boolean {
  const code = driverCode(error);
  return code === UNIQUE_VIOLATION || code === SERIALIZATION_FAILURE;
}

export function isUniqueViolation(error: unknown): boolean {
  return driverCode(error) === UNIQUE_VIOLATION;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

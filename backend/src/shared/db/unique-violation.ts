/**
 * backend/src/shared/db/unique-violation.ts
 *
 * WHY:
 * - Services must be able to react to a UNIQUE constraint failure without importing `pg`.
 * - DAL classes translate the driver error into UniqueViolationError, carrying the
 *   constraint name so callers can tell which rule was broken.
 *
 * RULES:
 * - DAL-only helper. Services only see UniqueViolationError.
 */

import pg from 'pg';

const PG_UNIQUE_VIOLATION = '23505';

export class UniqueViolationError extends Error {
  constructor(
    public readonly constraint: string | null,
    options?: { cause?: unknown },
  ) {
    super(`Unique constraint violated: ${constraint ?? 'unknown'}`, options);
    this.name = 'UniqueViolationError';
  }
}

export function isPgUniqueViolation(err: unknown): err is pg.DatabaseError {
  return err instanceof pg.DatabaseError && err.code === PG_UNIQUE_VIOLATION;
}

/**
 * Runs a write and rethrows driver unique violations as UniqueViolationError.
 * Every other error is rethrown untouched.
 */
export async function translateUniqueViolation<T>(write: () => Promise<T>): Promise<T> {
  try {
    return await write();
  } catch (err) {
    if (isPgUniqueViolation(err)) {
      throw new UniqueViolationError(err.constraint ?? null, { cause: err });
    }
    throw err;
  }
}

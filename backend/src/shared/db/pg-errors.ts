/**
 * backend/src/shared/db/pg-errors.ts
 *
 * WHY:
 * - Services map constraint violations to domain errors (e.g. duplicate placement)
 *   without depending on the driver's error classes.
 */

const UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    err.code === UNIQUE_VIOLATION
  );
}

import { QueryFailedError } from 'typeorm';

/** PostgreSQL SQLSTATE for unique_violation */
const PG_UNIQUE_VIOLATION = '23505';

interface PgDriverError {
  code?: unknown;
  constraint?: unknown;
}

function driverErrorOf(error: QueryFailedError): PgDriverError {
  const driverError: unknown = error.driverError;
  if (typeof driverError !== 'object' || driverError === null) {
    return {};
  }
  return {
    code: 'code' in driverError ? driverError.code : undefined,
    constraint: 'constraint' in driverError ? driverError.constraint : undefined,
  };
}

/**
 * True when a query failed because it would break a unique constraint.
 * This is the authoritative duplicate check under concurrent inserts.
 */
export function isUniqueViolation(error: unknown): error is QueryFailedError {
  return (
    error instanceof QueryFailedError &&
    driverErrorOf(error).code === PG_UNIQUE_VIOLATION
  );
}

/** Name of the violated constraint, e.g. `UQ_users_email`, when the driver reports it. */
export function uniqueViolationConstraint(error: QueryFailedError): string | null {
  const { constraint } = driverErrorOf(error);
  return typeof constraint === 'string' ? constraint : null;
}

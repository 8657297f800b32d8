import { ConflictException, HttpStatus } from '@nestjs/common';

/**
 * Thrown when the database rejects a write because a unique value was
 * taken by a concurrent request after the application-level check passed.
 *
 * HTTP 409 Conflict, with the same field-keyed `errors` map as a 422.
 */
export class FieldConflictException extends ConflictException {
  constructor(readonly field: string | null) {
    const message = field
      ? `The ${field} has already been taken.`
      : 'A user with these details already exists.';

    super({
      statusCode: HttpStatus.CONFLICT,
      error: 'Conflict',
      message,
      errors: field ? { [field]: [message] } : {},
    });
  }
}

import { HttpStatus, UnprocessableEntityException } from '@nestjs/common';

/** Field name → every message that applies to it, in rule order. */
export type FieldErrors = Record<string, string[]>;

/**
 * Thrown when a request payload fails one or more field rules.
 *
 * HTTP 422 Unprocessable Entity. All violated fields are reported
 * together so the client can fix the whole payload in one round trip.
 */
export class ValidationFailedException extends UnprocessableEntityException {
  readonly errors: FieldErrors;

  constructor(errors: FieldErrors) {
    super({
      statusCode: HttpStatus.UNPROCESSABLE_ENTITY,
      error: 'Unprocessable Entity',
      message: 'The given data was invalid.',
      errors,
    });
    this.errors = errors;
  }
}

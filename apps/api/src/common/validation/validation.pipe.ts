import { ValidationPipe } from '@nestjs/common';
import type { ValidationError } from 'class-validator';
import { FieldErrors, ValidationFailedException } from './validation-failed.exception';

/**
 * Flattens class-validator output into a field-keyed error map.
 * Nested properties are addressed with dots, e.g. `address.city`.
 */
export function collectFieldErrors(
  errors: ValidationError[],
  parentPath = '',
): FieldErrors {
  const result: FieldErrors = {};

  for (const error of errors) {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;

    if (error.constraints) {
      result[path] = [...(result[path] ?? []), ...Object.values(error.constraints)];
    }

    if (error.children && error.children.length > 0) {
      Object.assign(result, collectFieldErrors(error.children, path));
    }
  }

  return result;
}

/**
 * The application-wide pipe: every DTO's decorators form the rule table,
 * this pipe evaluates them all and reports every failing field at once.
 *
 * - whitelist + forbidNonWhitelisted: fields a client may not set
 *   (e.g. `ownerId`) are rejected instead of silently accepted
 * - transform: payloads become DTO instances; only fields marked with
 *   `@Type` are converted, so a number sent for a string field still fails
 */
export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    forbidNonWhitelisted: true,
    transform: true,
    exceptionFactory: (errors: ValidationError[]) =>
      new ValidationFailedException(collectFieldErrors(errors)),
  });
}

export { ValidationFailedException } from './validation-failed.exception';
export type { FieldErrors } from './validation-failed.exception';
export { collectFieldErrors, createValidationPipe } from './validation.pipe';
export { MaxBytes } from './max-bytes.decorator';

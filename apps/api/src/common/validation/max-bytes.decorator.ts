import { ValidateBy, ValidationOptions } from 'class-validator';

const MAX_BYTES = 'maxBytes';

/**
 * Caps the UTF-8 encoded length of a string. MaxLength counts UTF-16 code
 * units, which lets multi-byte text past a byte-limited consumer like bcrypt.
 */
export function MaxBytes(max: number, validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: MAX_BYTES,
      constraints: [max],
      validator: {
        validate: (value: unknown): boolean =>
          typeof value === 'string' && Buffer.byteLength(value, 'utf8') <= max,
        defaultMessage: () => `$property must not be longer than ${max} bytes`,
      },
    },
    validationOptions,
  );
}

import { Transform } from 'class-transformer';
import { IsEmail, IsNotEmpty, IsString, MaxLength, MinLength } from 'class-validator';
import { MaxBytes } from '../../common/validation';

const trim = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' ? value.trim() : value;

/**
 * DTO for user registration (JSON or multipart with an `avatar` file).
 *
 * Uniqueness of name and email and the avatar image rules are checked by
 * UsersService, which needs the store and the uploaded file.
 * The 72 byte password cap is bcrypt's input limit.
 */
export class RegisterDto {
  @Transform(trim)
  @IsString({ message: 'The name field must be a string.' })
  @IsNotEmpty({ message: 'The name field is required.' })
  @MaxLength(255, { message: 'The name field must not be greater than 255 characters.' })
  name!: string;

  @Transform(trim)
  @IsEmail({}, { message: 'The email field must be a valid email address.' })
  @IsNotEmpty({ message: 'The email field is required.' })
  @MaxLength(255, { message: 'The email field must not be greater than 255 characters.' })
  email!: string;

  @IsString({ message: 'The password field must be a string.' })
  @IsNotEmpty({ message: 'The password field is required.' })
  @MinLength(6, { message: 'The password field must be at least 6 characters.' })
  @MaxBytes(72, { message: 'The password field must not be greater than 72 bytes.' })
  password!: string;
}

import { Transform } from 'class-transformer';
import { IsEmail, IsNotEmpty, IsString, MaxLength } from 'class-validator';

const trim = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' ? value.trim() : value;

/**
 * DTO for PUT /user. Name and email are both required (full replacement);
 * an optional `avatar` file may accompany them as multipart.
 */
export class UpdateProfileDto {
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
}

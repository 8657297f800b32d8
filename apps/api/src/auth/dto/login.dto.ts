import { IsNotEmpty, IsString } from 'class-validator';

/**
 * DTO for user login.
 *
 * Only presence is checked; whether the pair matches is decided by
 * UsersService.authenticate so every failure gets the same message.
 */
export class LoginDto {
  @IsString({ message: 'The email field must be a string.' })
  @IsNotEmpty({ message: 'The email field is required.' })
  email!: string;

  @IsString({ message: 'The password field must be a string.' })
  @IsNotEmpty({ message: 'The password field is required.' })
  password!: string;
}

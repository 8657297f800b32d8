import { IsNotEmpty, IsString, MinLength } from 'class-validator';
import { MaxBytes } from '../../common/validation';

export class UpdatePasswordDto {
  @IsString({ message: 'The password field must be a string.' })
  @IsNotEmpty({ message: 'The password field is required.' })
  @MinLength(6, { message: 'The password field must be at least 6 characters.' })
  @MaxBytes(72, { message: 'The password field must not be greater than 72 bytes.' })
  password!: string;
}

import { Transform } from 'class-transformer';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

/**
 * Body of POST /tasks. Only the name is accepted: the owner comes from the
 * bearer token and the state starts as "active". Any other field, such as
 * `ownerId` or `state`, is rejected by the whitelist.
 */
export class CreateTaskDto {
  @Transform(({ value }: { value: unknown }) => (typeof value === 'string' ? value.trim() : value))
  @IsString({ message: 'The name field must be a string.' })
  @IsNotEmpty({ message: 'The name field is required.' })
  @MaxLength(255, { message: 'The name field must not be greater than 255 characters.' })
  name!: string;
}

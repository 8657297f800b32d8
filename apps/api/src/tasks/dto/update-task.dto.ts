import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

/** Body of PUT /tasks/:id. Any non-empty text is a valid state. */
export class UpdateTaskDto {
  @IsString({ message: 'The state field must be a string.' })
  @IsNotEmpty({ message: 'The state field is required.' })
  @MaxLength(255, { message: 'The state field must not be greater than 255 characters.' })
  state!: string;
}

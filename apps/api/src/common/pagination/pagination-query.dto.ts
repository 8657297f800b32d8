import { Type } from 'class-transformer';
import { IsInt, IsOptional, Max, Min } from 'class-validator';

export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;
/** Keeps `(page - 1) * pageSize` a plain integer OFFSET. */
export const MAX_PAGE = 10_000_000;

/** Query parameters accepted by every simple-paginated list route. */
export class PaginationQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'The page field must be an integer.' })
  @Min(1, { message: 'The page field must be at least 1.' })
  @Max(MAX_PAGE, {
    message: `The page field must not be greater than ${MAX_PAGE}.`,
  })
  page: number = 1;

  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'The page size field must be an integer.' })
  @Min(1, { message: 'The page size field must be at least 1.' })
  @Max(MAX_PAGE_SIZE, {
    message: `The page size field must not be greater than ${MAX_PAGE_SIZE}.`,
  })
  pageSize: number = DEFAULT_PAGE_SIZE;
}

import { Type } from 'class-transformer';
import { IsInt, IsOptional, Max, Min } from 'class-validator';

export const DEFAULT_PAGE_SIZE = 10;
// Hard ceiling for the query string; CatalogSettings clamps further to the configured maximum.
export const ABSOLUTE_MAX_PAGE_SIZE = 1000;

export class PaginationQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'limit must be an integer.' })
  @Min(1, { message: 'limit must be at least 1.' })
  @Max(ABSOLUTE_MAX_PAGE_SIZE, { message: `limit must not exceed ${ABSOLUTE_MAX_PAGE_SIZE}.` })
  limit?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'offset must be an integer.' })
  @Min(0, { message: 'offset cannot be negative.' })
  offset?: number;
}

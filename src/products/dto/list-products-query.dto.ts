import { IsArray, IsBoolean, IsIn, IsNumber, IsOptional, IsString, IsUUID, Min } from 'class-validator';
import { Transform, Type } from 'class-transformer';
import { PaginationQueryDto } from '../../common/dto/pagination-query.dto';
import { PRODUCT_CONDITIONS, ProductCondition } from '../entities/product.entity';
import { ProductSortField, SORTABLE_FIELDS, SortOrder } from '../repositories/product-list.plan';

function toBoolean({ value }: { value: unknown }): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}

// `tags=a,b` and `tags=a&tags=b` both end up as ['a', 'b'].
function toTagList({ value }: { value: unknown }): unknown {
  const raw: unknown[] = Array.isArray(value) ? value : [value];
  if (!raw.every((entry) => typeof entry === 'string')) {
    return value;
  }
  return raw
    .flatMap((entry) => String(entry).split(','))
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
}

// Anything but "desc" (any case) sorts ascending.
function toSortOrder({ value }: { value: unknown }): SortOrder | undefined {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  return String(value).toLowerCase() === 'desc' ? 'desc' : 'asc';
}

export class ProductFilterQueryDto extends PaginationQueryDto {
  @IsUUID('all', { message: 'brandId must be a valid UUID.' })
  @IsOptional()
  brandId?: string;

  @Type(() => Number)
  @IsNumber({}, { message: 'priceMin must be a number.' })
  @Min(0, { message: 'priceMin cannot be negative.' })
  @IsOptional()
  priceMin?: number;

  @Type(() => Number)
  @IsNumber({}, { message: 'priceMax must be a number.' })
  @Min(0, { message: 'priceMax cannot be negative.' })
  @IsOptional()
  priceMax?: number;

  @Transform(toTagList)
  @IsArray({ message: 'tags must be a comma-separated list.' })
  @IsString({ each: true })
  @IsOptional()
  tags?: string[];

  @Transform(toBoolean)
  @IsBoolean({ message: 'isAvailable must be true or false.' })
  @IsOptional()
  isAvailable?: boolean;

  @Transform(toBoolean)
  @IsBoolean({ message: 'isNew must be true or false.' })
  @IsOptional()
  isNew?: boolean;

  @IsIn(PRODUCT_CONDITIONS, { message: `condition must be one of: ${PRODUCT_CONDITIONS.join(', ')}.` })
  @IsOptional()
  condition?: ProductCondition;

  @IsIn(SORTABLE_FIELDS, { message: `sortBy must be one of: ${SORTABLE_FIELDS.join(', ')}.` })
  @IsOptional()
  sortBy?: ProductSortField;

  @Transform(toSortOrder)
  @IsOptional()
  sortOrder?: SortOrder;
}

export class ListProductsQueryDto extends ProductFilterQueryDto {
  @IsUUID('all', { message: 'categoryId must be a valid UUID.' })
  @IsOptional()
  categoryId?: string;

  @IsString({ message: 'search must be a string.' })
  @IsOptional()
  search?: string;
}

/** `GET /products/search?query=...` */
export class SearchProductsQueryDto extends ProductFilterQueryDto {
  @IsString({ message: 'query must be a string.' })
  @IsOptional()
  query?: string;

  @IsUUID('all', { message: 'categoryId must be a valid UUID.' })
  @IsOptional()
  categoryId?: string;
}

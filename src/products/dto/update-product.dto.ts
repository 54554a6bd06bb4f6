import {
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  IsUUID,
  Length,
  Matches,
  Min,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { PRODUCT_CONDITIONS, PRODUCT_STATUSES, ProductCondition, ProductStatus } from '../entities/product.entity';
import {
  ConfigOptionDto,
  ProductAttributeDto,
  ProductImageDto,
  ProductVariantDto,
  ShippingDto,
  WarrantyDto,
} from './product-parts.dto';

/** Every field optional; a collection that is present replaces the stored one. */
export class UpdateProductDto {
  @IsString({ message: 'Product name must be a string.' })
  @IsNotEmpty({ message: 'Product name is required and cannot be empty.' })
  @Length(1, 255, { message: 'Product name must be between 1 and 255 characters.' })
  @IsOptional()
  name?: string | null;

  @IsString({ message: 'Slug must be a string.' })
  @Matches(/^[a-z0-9]+(?:-[a-z0-9]+)*$/, { message: 'Slug may only contain lower-case letters, digits and single hyphens.' })
  @IsOptional()
  slug?: string | null;

  @IsString({ message: 'Description must be a string.' })
  @IsOptional()
  description?: string | null;

  @IsString({ message: 'Summary must be a string.' })
  @IsOptional()
  summary?: string | null;

  @IsNumber({}, { message: 'Price must be a number.' })
  @Min(0, { message: 'Price cannot be negative.' })
  @IsOptional()
  price?: number | null;

  @Matches(/^[A-Z]{3}$/, { message: 'Currency must be a 3-letter upper-case code.' })
  @IsOptional()
  currency?: string;

  @IsNumber({}, { message: 'compareAtPrice must be a number.' })
  @Min(0, { message: 'compareAtPrice cannot be negative.' })
  @IsOptional()
  compareAtPrice?: number | null;

  @IsString({ message: 'SKU must be a string.' })
  @IsNotEmpty({ message: 'SKU is required and cannot be empty.' })
  @Length(1, 100, { message: 'SKU must be between 1 and 100 characters.' })
  @IsOptional()
  sku?: string | null;

  @IsString({ message: 'Model must be a string.' })
  @IsOptional()
  model?: string | null;

  @IsIn(PRODUCT_STATUSES, { message: `Status must be one of: ${PRODUCT_STATUSES.join(', ')}.` })
  @IsOptional()
  status?: ProductStatus | null;

  @IsInt({ message: 'Stock must be an integer.' })
  @Min(0, { message: 'Stock cannot be negative.' })
  @IsOptional()
  stock?: number | null;

  @IsBoolean({ message: 'isAvailable must be a boolean.' })
  @IsOptional()
  isAvailable?: boolean | null;

  @IsBoolean({ message: 'isNew must be a boolean.' })
  @IsOptional()
  isNew?: boolean | null;

  @IsBoolean({ message: 'isRefurbished must be a boolean.' })
  @IsOptional()
  isRefurbished?: boolean | null;

  @IsIn(PRODUCT_CONDITIONS, { message: `Condition must be one of: ${PRODUCT_CONDITIONS.join(', ')}.` })
  @IsOptional()
  condition?: ProductCondition | null;

  @IsBoolean({ message: 'hasVariants must be a boolean.' })
  @IsOptional()
  hasVariants?: boolean | null;

  @IsUUID('all', { message: 'brandId must be a valid UUID.' })
  @IsOptional()
  brandId?: string | null;

  @IsArray({ message: 'categoryIds must be an array.' })
  @IsUUID('all', { each: true, message: 'Each category id must be a valid UUID.' })
  @IsOptional()
  categoryIds?: string[] | null;

  @IsArray({ message: 'Tags must be an array of strings.' })
  @IsString({ each: true, message: 'Each tag must be a string.' })
  @IsOptional()
  tags?: string[] | null;

  @IsArray({ message: 'Attributes must be an array.' })
  @ValidateNested({ each: true })
  @Type(() => ProductAttributeDto)
  @IsOptional()
  attributes?: ProductAttributeDto[] | null;

  @IsArray({ message: 'highlightedFeatures must be an array of strings.' })
  @IsString({ each: true, message: 'Each highlighted feature must be a string.' })
  @IsOptional()
  highlightedFeatures?: string[] | null;

  @IsObject({ message: 'Warranty must be an object.' })
  @ValidateNested()
  @Type(() => WarrantyDto)
  @IsOptional()
  warranty?: WarrantyDto | null;

  @IsObject({ message: 'Shipping must be an object.' })
  @ValidateNested()
  @Type(() => ShippingDto)
  @IsOptional()
  shipping?: ShippingDto | null;

  @IsArray({ message: 'Images must be an array.' })
  @ValidateNested({ each: true })
  @Type(() => ProductImageDto)
  @IsOptional()
  images?: ProductImageDto[] | null;

  @IsArray({ message: 'Variants must be an array.' })
  @ValidateNested({ each: true })
  @Type(() => ProductVariantDto)
  @IsOptional()
  variants?: ProductVariantDto[] | null;

  @IsArray({ message: 'configOptions must be an array.' })
  @ValidateNested({ each: true })
  @Type(() => ConfigOptionDto)
  @IsOptional()
  configOptions?: ConfigOptionDto[] | null;
}

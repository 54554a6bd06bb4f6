import {
  IsArray,
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  Length,
  Matches,
  Min,
  ValidateBy,
  ValidateNested,
  ValidationOptions,
} from 'class-validator';
import { Type } from 'class-transformer';

function isScalar(value: unknown): boolean {
  return value === null || ['string', 'number', 'boolean'].includes(typeof value);
}

// Attribute values are free-form scalars; objects and arrays are rejected.
function IsScalarValue(options?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: 'isScalarValue',
      validator: {
        validate: (value: unknown) => isScalar(value),
        defaultMessage: () => 'Attribute value must be a string, number, boolean or null.',
      },
    },
    options,
  );
}

function IsStringMap(options?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: 'isStringMap',
      validator: {
        validate: (value: unknown) =>
          typeof value === 'object' && value !== null && !Array.isArray(value)
          && Object.values(value).every((entry) => typeof entry === 'string'),
        defaultMessage: () => 'Variant attributes must map names to string values.',
      },
    },
    options,
  );
}

export class ProductImageDto {
  @IsString({ message: 'Image url must be a string.' })
  @IsNotEmpty({ message: 'Image url is required.' })
  @Length(1, 512, { message: 'Image url must be between 1 and 512 characters.' })
  url!: string;

  @IsString({ message: 'Image alt must be a string.' })
  @IsOptional()
  alt?: string | null;

  @IsBoolean({ message: 'Image isMain must be a boolean.' })
  @IsOptional()
  isMain?: boolean;

  @IsInt({ message: 'Image order must be an integer.' })
  @Min(0, { message: 'Image order cannot be negative.' })
  @IsOptional()
  order?: number;
}

export class ProductAttributeDto {
  @IsString({ message: 'Attribute name must be a string.' })
  @IsNotEmpty({ message: 'Attribute name is required.' })
  name!: string;

  @IsScalarValue()
  value!: string | number | boolean | null;

  @IsString({ message: 'Attribute displayValue must be a string.' })
  @IsOptional()
  displayValue?: string;

  @IsBoolean({ message: 'Attribute isHighlighted must be a boolean.' })
  @IsOptional()
  isHighlighted?: boolean;

  @IsString({ message: 'Attribute groupName must be a string.' })
  @IsOptional()
  groupName?: string | null;
}

export class ProductVariantDto {
  @IsString({ message: 'Variant SKU must be a string.' })
  @IsNotEmpty({ message: 'Variant SKU is required.' })
  @Length(1, 100, { message: 'Variant SKU must be between 1 and 100 characters.' })
  sku!: string;

  @IsString({ message: 'Variant name must be a string.' })
  @IsNotEmpty({ message: 'Variant name is required.' })
  name!: string;

  @IsNumber({}, { message: 'Variant price must be a number.' })
  @Min(0, { message: 'Variant price cannot be negative.' })
  price!: number;

  @Matches(/^[A-Z]{3}$/, { message: 'Variant currency must be a 3-letter upper-case code.' })
  @IsOptional()
  currency?: string;

  @IsNumber({}, { message: 'Variant compareAtPrice must be a number.' })
  @Min(0, { message: 'Variant compareAtPrice cannot be negative.' })
  @IsOptional()
  compareAtPrice?: number | null;

  @IsInt({ message: 'Variant stock must be an integer.' })
  @Min(0, { message: 'Variant stock cannot be negative.' })
  @IsOptional()
  stock?: number;

  @IsBoolean({ message: 'Variant isAvailable must be a boolean.' })
  @IsOptional()
  isAvailable?: boolean;

  @IsBoolean({ message: 'Variant isSelected must be a boolean.' })
  @IsOptional()
  isSelected?: boolean;

  @IsStringMap()
  @IsOptional()
  attributes?: Record<string, string>;

  @IsArray({ message: 'Variant images must be an array.' })
  @ValidateNested({ each: true })
  @Type(() => ProductImageDto)
  @IsOptional()
  images?: ProductImageDto[];
}

export class ConfigOptionValueDto {
  @IsString({ message: 'Option value must be a string.' })
  @IsNotEmpty({ message: 'Option value is required.' })
  value!: string;

  @IsBoolean({ message: 'Option value isAvailable must be a boolean.' })
  @IsOptional()
  isAvailable?: boolean;

  @IsBoolean({ message: 'Option value isSelected must be a boolean.' })
  @IsOptional()
  isSelected?: boolean;

  @IsString({ message: 'Option value image must be a string.' })
  @IsOptional()
  image?: string | null;
}

export class ConfigOptionDto {
  @IsString({ message: 'Config option name must be a string.' })
  @IsNotEmpty({ message: 'Config option name is required.' })
  name!: string;

  @IsArray({ message: 'Config option values must be an array.' })
  @ValidateNested({ each: true })
  @Type(() => ConfigOptionValueDto)
  values!: ConfigOptionValueDto[];
}

export class DeliveryEstimateDto {
  @IsInt({ message: 'Delivery estimate min must be an integer.' })
  @Min(0)
  min!: number;

  @IsInt({ message: 'Delivery estimate max must be an integer.' })
  @Min(0)
  max!: number;

  @IsString({ message: 'Delivery estimate unit must be a string.' })
  unit!: string;
}

export class WarrantyDto {
  @IsBoolean({ message: 'Warranty hasWarranty must be a boolean.' })
  hasWarranty!: boolean;

  @IsInt({ message: 'Warranty length must be an integer.' })
  @Min(0)
  @IsOptional()
  length?: number | null;

  @IsString()
  @IsOptional()
  unit?: string | null;

  @IsString()
  @IsOptional()
  type?: string | null;

  @IsString()
  @IsOptional()
  description?: string | null;
}

export class ShippingMethodDto {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsNumber({}, { message: 'Shipping cost must be a number.' })
  @Min(0, { message: 'Shipping cost cannot be negative.' })
  cost!: number;

  @IsObject()
  @ValidateNested()
  @Type(() => DeliveryEstimateDto)
  @IsOptional()
  estimatedDeliveryTime?: DeliveryEstimateDto | null;
}

export class ShippingDto {
  @IsBoolean({ message: 'Shipping isFree must be a boolean.' })
  isFree!: boolean;

  @IsObject()
  @ValidateNested()
  @Type(() => DeliveryEstimateDto)
  @IsOptional()
  estimatedDeliveryTime?: DeliveryEstimateDto | null;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ShippingMethodDto)
  @IsOptional()
  availableShippingMethods?: ShippingMethodDto[];
}

import { v4 as uuidv4 } from 'uuid';
import { BrandSummary } from '../../brands/entities/brand.entity';
import { CategorySummary } from '../../categories/entities/category.entity';
import {
  AttributeValue,
  ConfigOption,
  Product,
  ProductAttribute,
  ProductCondition,
  ProductImage,
  ProductReview,
  ProductStatus,
  ProductVariant,
  Shipping,
  Warranty,
} from '../entities/product.entity';

export interface ProductImageResponse {
  id: string;
  url: string;
  alt: string | null;
  isMain: boolean;
  order: number;
}

export interface ProductAttributeResponse {
  id: string;
  name: string;
  value: AttributeValue;
  displayValue: string;
  isHighlighted: boolean;
  groupName: string | null;
}

export interface ProductVariantResponse {
  id: string;
  sku: string;
  name: string;
  price: number;
  currency: string;
  compareAtPrice: number | null;
  stock: number;
  isAvailable: boolean;
  isSelected: boolean;
  attributes: Record<string, string>;
  images: ProductImageResponse[];
}

export interface ConfigOptionResponse {
  id: string;
  name: string;
  values: Array<{ id: string; value: string; isAvailable: boolean; isSelected: boolean; image: string | null }>;
}

export interface ProductResponse {
  id: string;
  name: string;
  slug: string;
  description: string;
  summary: string | null;
  price: number;
  currency: string;
  compareAtPrice: number | null;
  sku: string;
  model: string | null;
  status: ProductStatus;
  stock: number;
  isAvailable: boolean;
  isNew: boolean;
  isRefurbished: boolean;
  condition: ProductCondition;
  hasVariants: boolean;
  tags: string[];
  attributes: ProductAttributeResponse[];
  highlightedFeatures: string[];
  warranty: Warranty | null;
  shipping: Shipping | null;
  brand: BrandSummary | null;
  categories: CategorySummary[];
  images: ProductImageResponse[];
  variants: ProductVariantResponse[];
  configOptions: ConfigOptionResponse[];
  reviews: ProductReview[];
  createdAt: string;
  updatedAt: string;
}

/**
 * Serialises a product for the wire. Ids missing on legacy rows are filled in
 * here; synthesised attribute ids are only stable within one response.
 */
export function toProductResponse(product: Product): ProductResponse {
  return {
    id: String(product.id),
    name: product.name,
    slug: product.slug,
    description: product.description,
    summary: product.summary,
    price: Number(product.price.amount),
    currency: product.price.currency,
    compareAtPrice: product.compareAtPrice === null ? null : Number(product.compareAtPrice),
    sku: product.sku,
    model: product.model,
    status: product.status,
    stock: product.stock,
    isAvailable: product.isAvailable,
    isNew: product.isNew,
    isRefurbished: product.isRefurbished,
    condition: product.condition,
    hasVariants: product.hasVariants,
    tags: [...product.tags],
    attributes: product.attributes.map(toAttributeResponse),
    highlightedFeatures: [...product.highlightedFeatures],
    warranty: product.warranty,
    shipping: product.shipping,
    brand: product.brand,
    categories: product.categories,
    images: product.images.map(toImageResponse),
    variants: product.variants.map(toVariantResponse),
    configOptions: product.configOptions.map(toConfigOptionResponse),
    reviews: product.reviews,
    createdAt: product.createdAt,
    updatedAt: product.updatedAt,
  };
}

function toAttributeResponse(attribute: ProductAttribute, index: number): ProductAttributeResponse {
  return {
    id: attribute.id ?? `attr-${index}-${randomSuffix()}`,
    name: attribute.name,
    value: attribute.value,
    displayValue: attribute.displayValue,
    isHighlighted: attribute.isHighlighted,
    groupName: attribute.groupName,
  };
}

function toImageResponse(image: ProductImage): ProductImageResponse {
  return {
    id: image.id ? String(image.id) : uuidv4(),
    url: image.url,
    alt: image.alt,
    isMain: image.isMain,
    order: image.order,
  };
}

function toVariantResponse(variant: ProductVariant): ProductVariantResponse {
  return {
    id: String(variant.id),
    sku: variant.sku,
    name: variant.name,
    price: Number(variant.price.amount),
    currency: variant.price.currency,
    compareAtPrice: variant.compareAtPrice === null ? null : Number(variant.compareAtPrice),
    stock: variant.stock,
    isAvailable: variant.isAvailable,
    isSelected: variant.isSelected,
    attributes: { ...variant.attributes },
    images: variant.images.map(toImageResponse),
  };
}

function toConfigOptionResponse(option: ConfigOption): ConfigOptionResponse {
  return {
    id: option.id ? String(option.id) : uuidv4(),
    name: option.name,
    values: option.values.map((value) => ({
      id: value.id ?? uuidv4(),
      value: value.value,
      isAvailable: value.isAvailable,
      isSelected: value.isSelected,
      image: value.image,
    })),
  };
}

function randomSuffix(): string {
  return uuidv4().replace(/-/g, '').slice(0, 8);
}

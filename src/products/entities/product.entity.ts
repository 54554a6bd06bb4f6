import { InvalidEntityError } from '../../common/errors/catalog.errors';
import { BrandSummary } from '../../brands/entities/brand.entity';
import { CategorySummary } from '../../categories/entities/category.entity';

export const PRODUCT_CONDITIONS = ['new', 'used', 'refurbished'] as const;
export type ProductCondition = (typeof PRODUCT_CONDITIONS)[number];

export const PRODUCT_STATUSES = ['active', 'inactive'] as const;
export type ProductStatus = (typeof PRODUCT_STATUSES)[number];

export interface Money {
    amount: number;
    currency: string; // ISO 4217, three upper-case letters
}

export interface ProductImage {
    id: string;
    url: string;
    alt: string | null;
    isMain: boolean;
    order: number;
    variantId: string | null; // set when the image belongs to a variant
}

export type AttributeValue = string | number | boolean | null;

export interface ProductAttribute {
    id: string | null; // null only on rows written before ids were assigned
    name: string;
    value: AttributeValue;
    displayValue: string;
    isHighlighted: boolean;
    groupName: string | null;
}

export interface ProductVariant {
    id: string;
    productId: string;
    sku: string; // unique across all variants
    name: string;
    price: Money;
    compareAtPrice: number | null;
    stock: number;
    isAvailable: boolean;
    isSelected: boolean;
    attributes: Record<string, string>;
    images: ProductImage[];
}

export interface ConfigOptionValue {
    id: string | null;
    value: string;
    isAvailable: boolean;
    isSelected: boolean;
    image: string | null;
}

export interface ConfigOption {
    id: string;
    name: string;
    values: ConfigOptionValue[];
}

export interface ProductReview {
    id: string;
    userId: string;
    userName: string;
    rating: number;
    title: string | null;
    comment: string;
    isVerifiedPurchase: boolean;
    likes: number;
    createdAt: string;
}

export interface Warranty {
    hasWarranty: boolean;
    length: number | null;
    unit: string | null;
    type: string | null;
    description: string | null;
}

export interface DeliveryEstimate {
    min: number;
    max: number;
    unit: string;
}

export interface ShippingMethod {
    id: string;
    name: string;
    cost: number;
    estimatedDeliveryTime: DeliveryEstimate | null;
}

export interface Shipping {
    isFree: boolean;
    estimatedDeliveryTime: DeliveryEstimate | null;
    availableShippingMethods: ShippingMethod[];
}

/** A product together with everything it owns or references. */
export interface Product {
    id: string;
    name: string;
    slug: string;
    description: string;
    summary: string | null;
    price: Money;
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
    attributes: ProductAttribute[];
    highlightedFeatures: string[];
    warranty: Warranty | null;
    shipping: Shipping | null;
    brand: BrandSummary | null;
    categories: CategorySummary[];
    images: ProductImage[];
    variants: ProductVariant[];
    configOptions: ConfigOption[];
    reviews: ProductReview[];
    createdAt: string;
    updatedAt: string;
}

// Write models. Images and variants get their ids from the database.

export type NewProductImage = Omit<ProductImage, 'id' | 'variantId'>;

export interface NewProductVariant {
    sku: string;
    name: string;
    price: Money;
    compareAtPrice: number | null;
    stock: number;
    isAvailable: boolean;
    isSelected: boolean;
    attributes: Record<string, string>;
    images: NewProductImage[];
}

export interface ProductFields {
    name: string;
    slug: string;
    description: string;
    summary: string | null;
    price: Money;
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
    brandId: string | null;
    tags: string[];
    attributes: ProductAttribute[];
    highlightedFeatures: string[];
    warranty: Warranty | null;
    shipping: Shipping | null;
}

export type NewConfigOption = Omit<ConfigOption, 'id'>;

export interface ProductCollections {
    categoryIds: string[];
    images: NewProductImage[];
    variants: NewProductVariant[];
    configOptions: NewConfigOption[];
}

export type NewProduct = ProductFields & ProductCollections;

/** Partial update: an absent key leaves the stored value alone; a present collection replaces it wholesale. */
export type ProductChanges = Partial<ProductFields> & Partial<ProductCollections>;

const CURRENCY_PATTERN = /^[A-Z]{3}$/;

export function assertValidMoney(price: Money, label = 'Price'): void {
    if (!Number.isFinite(price.amount) || price.amount < 0) {
        throw new InvalidEntityError(`${label} amount cannot be negative`);
    }
    if (!CURRENCY_PATTERN.test(price.currency)) {
        throw new InvalidEntityError(`${label} currency must be a 3-letter code, got "${price.currency}"`);
    }
}

/** Invariants every stored product satisfies, checked before any write. */
export function assertProductInvariants(
    product: Pick<ProductFields, 'name' | 'price' | 'stock' | 'compareAtPrice'> & { variants?: NewProductVariant[] },
): void {
    if (!product.name || !product.name.trim()) {
        throw new InvalidEntityError('Product name cannot be empty');
    }
    assertValidMoney(product.price);
    if (product.compareAtPrice !== null && product.compareAtPrice < 0) {
        throw new InvalidEntityError('Compare-at price cannot be negative');
    }
    if (!Number.isInteger(product.stock) || product.stock < 0) {
        throw new InvalidEntityError('Stock cannot be negative');
    }
    for (const variant of product.variants ?? []) {
        if (!variant.name.trim()) {
            throw new InvalidEntityError(`Variant ${variant.sku} name cannot be empty`);
        }
        assertValidMoney(variant.price, `Variant ${variant.sku} price`);
        if (variant.stock < 0) {
            throw new InvalidEntityError(`Variant ${variant.sku} stock cannot be negative`);
        }
    }
}

import { BrandSummary } from '../../brands/entities/brand.entity';
import { CategorySummary } from '../../categories/entities/category.entity';
import {
    AttributeValue,
    ConfigOption,
    ConfigOptionValue,
    DeliveryEstimate,
    NewConfigOption,
    NewProductImage,
    NewProductVariant,
    PRODUCT_CONDITIONS,
    PRODUCT_STATUSES,
    Product,
    ProductAttribute,
    ProductCondition,
    ProductFields,
    ProductImage,
    ProductReview,
    ProductStatus,
    ProductVariant,
    Shipping,
    Warranty,
} from '../entities/product.entity';
import {
    AttributeJson,
    BrandSummaryRow,
    CategorySummaryRow,
    ConfigOptionRow,
    ConfigOptionValueJson,
    DeliveryEstimateJson,
    NumericColumn,
    ProductImageRow,
    ProductInsertRow,
    ProductReviewRow,
    ProductRowWithRelations,
    ProductUpdateRow,
    ProductVariantRow,
    ShippingJson,
    WarrantyJson,
} from './product.rows';

/** Thrown when a stored row cannot be turned into a domain record. Surfaces as a 500. */
export class RowMappingError extends Error {
    constructor(message: string) {
        super(message);
        this.name = RowMappingError.name;
    }
}

// --- row -> domain ---

export function toProduct(row: ProductRowWithRelations): Product {
    const allImages = sortImages(row.images ?? []);
    return {
        id: row.id,
        name: row.name,
        slug: row.slug,
        description: row.description,
        summary: row.summary,
        price: { amount: toNumber(row.price_amount, 'price_amount'), currency: row.price_currency },
        compareAtPrice: toNullableNumber(row.compare_at_price, 'compare_at_price'),
        sku: row.sku,
        model: row.model,
        status: toStatus(row.status),
        stock: row.stock,
        isAvailable: row.is_available,
        isNew: row.is_new,
        isRefurbished: row.is_refurbished,
        condition: toCondition(row.condition),
        hasVariants: row.has_variants,
        tags: row.tags ?? [],
        attributes: toAttributes(row.attributes),
        highlightedFeatures: row.highlighted_features ?? [],
        warranty: toWarranty(row.warranty),
        shipping: toShipping(row.shipping),
        brand: row.brand ? toBrandSummary(row.brand) : null,
        categories: (row.categories ?? []).map(toCategorySummary),
        // Variant images are embedded on both sides; only the product's own belong here.
        images: allImages.filter((image) => image.variant_id === null).map(toImage),
        variants: (row.variants ?? []).map(toVariant),
        configOptions: (row.config_options ?? []).map(toConfigOption),
        reviews: (row.reviews ?? []).map(toReview),
        createdAt: row.created_at,
        updatedAt: row.updated_at,
    };
}

export function toBrandSummary(row: BrandSummaryRow): BrandSummary {
    return { id: row.id, name: row.name, logo: row.logo };
}

export function toCategorySummary(row: CategorySummaryRow): CategorySummary {
    return { id: row.id, name: row.name, slug: row.slug, parentId: row.parent_id };
}

/** display_order, then insertion time, then id. */
export function sortImages(images: ProductImageRow[]): ProductImageRow[] {
    return [...images].sort((a, b) =>
        a.display_order - b.display_order
        || compareText(a.created_at, b.created_at)
        || compareText(a.id, b.id));
}

function toImage(row: ProductImageRow): ProductImage {
    return {
        id: row.id,
        url: row.url,
        alt: row.alt,
        isMain: row.is_main,
        order: row.display_order,
        variantId: row.variant_id,
    };
}

function toVariant(row: ProductVariantRow): ProductVariant {
    return {
        id: row.id,
        productId: row.product_id,
        sku: row.sku,
        name: row.name,
        price: { amount: toNumber(row.price_amount, 'variant price_amount'), currency: row.price_currency },
        compareAtPrice: toNullableNumber(row.compare_at_price, 'variant compare_at_price'),
        stock: row.stock,
        isAvailable: row.is_available,
        isSelected: row.is_selected,
        attributes: toStringMap(row.attributes),
        images: sortImages(row.images ?? []).map(toImage),
    };
}

function toConfigOption(row: ConfigOptionRow): ConfigOption {
    const raw = row.values ?? [];
    if (!Array.isArray(raw)) {
        throw new RowMappingError(`config_options ${row.id} values is not an array`);
    }
    const values: unknown[] = raw;
    return { id: row.id, name: row.name, values: values.map(toConfigOptionValue) };
}

function toConfigOptionValue(raw: unknown): ConfigOptionValue {
    if (!isRecord(raw) || typeof raw.value !== 'string') {
        throw new RowMappingError('config option value must be an object with a string value');
    }
    return {
        id: typeof raw.id === 'string' ? raw.id : null,
        value: raw.value,
        isAvailable: typeof raw.is_available === 'boolean' ? raw.is_available : true,
        isSelected: typeof raw.is_selected === 'boolean' ? raw.is_selected : false,
        image: typeof raw.image === 'string' ? raw.image : null,
    };
}

function toReview(row: ProductReviewRow): ProductReview {
    return {
        id: row.id,
        userId: row.user_id,
        userName: row.user_name,
        rating: row.rating,
        title: row.title,
        comment: row.comment,
        isVerifiedPurchase: row.is_verified_purchase,
        likes: row.likes,
        createdAt: row.created_at,
    };
}

function toAttributes(raw: unknown): ProductAttribute[] {
    if (raw === null || raw === undefined) {
        return [];
    }
    if (!Array.isArray(raw)) {
        throw new RowMappingError('products.attributes is not an array');
    }
    const items: unknown[] = raw;
    return items.map((item): ProductAttribute => {
        if (!isRecord(item) || typeof item.name !== 'string') {
            throw new RowMappingError('attribute must be an object with a name');
        }
        const value = toAttributeValue(item.value);
        return {
            id: typeof item.id === 'string' ? item.id : null,
            name: item.name,
            value,
            displayValue: typeof item.display_value === 'string' ? item.display_value : String(value ?? ''),
            isHighlighted: item.is_highlighted === true,
            groupName: typeof item.group_name === 'string' ? item.group_name : null,
        };
    });
}

function toAttributeValue(raw: unknown): AttributeValue {
    if (raw === null || raw === undefined) {
        return null;
    }
    if (typeof raw === 'string' || typeof raw === 'number' || typeof raw === 'boolean') {
        return raw;
    }
    throw new RowMappingError('attribute value must be a scalar');
}

function toWarranty(raw: unknown): Warranty | null {
    if (raw === null || raw === undefined) {
        return null;
    }
    if (!isRecord(raw)) {
        throw new RowMappingError('products.warranty is not an object');
    }
    return {
        hasWarranty: raw.has_warranty === true,
        length: typeof raw.length === 'number' ? raw.length : null,
        unit: typeof raw.unit === 'string' ? raw.unit : null,
        type: typeof raw.type === 'string' ? raw.type : null,
        description: typeof raw.description === 'string' ? raw.description : null,
    };
}

function toShipping(raw: unknown): Shipping | null {
    if (raw === null || raw === undefined) {
        return null;
    }
    if (!isRecord(raw)) {
        throw new RowMappingError('products.shipping is not an object');
    }
    const methods: unknown[] = Array.isArray(raw.available_shipping_methods) ? raw.available_shipping_methods : [];
    return {
        isFree: raw.is_free === true,
        estimatedDeliveryTime: toDeliveryEstimate(raw.estimated_delivery_time),
        availableShippingMethods: methods.map((method) => {
            if (!isRecord(method) || typeof method.id !== 'string' || typeof method.name !== 'string') {
                throw new RowMappingError('shipping method must have an id and a name');
            }
            return {
                id: method.id,
                name: method.name,
                cost: typeof method.cost === 'number' ? method.cost : 0,
                estimatedDeliveryTime: toDeliveryEstimate(method.estimated_delivery_time),
            };
        }),
    };
}

function toDeliveryEstimate(raw: unknown): DeliveryEstimate | null {
    if (!isRecord(raw)) {
        return null;
    }
    if (typeof raw.min !== 'number' || typeof raw.max !== 'number' || typeof raw.unit !== 'string') {
        throw new RowMappingError('delivery estimate needs numeric min and max and a unit');
    }
    return { min: raw.min, max: raw.max, unit: raw.unit };
}

function toStringMap(raw: unknown): Record<string, string> {
    if (raw === null || raw === undefined) {
        return {};
    }
    if (!isRecord(raw)) {
        throw new RowMappingError('variant attributes is not an object');
    }
    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(raw)) {
        result[key] = String(value);
    }
    return result;
}

function toStatus(value: string): ProductStatus {
    const status = PRODUCT_STATUSES.find((candidate) => candidate === value);
    if (!status) {
        throw new RowMappingError(`Unknown product status "${value}"`);
    }
    return status;
}

function toCondition(value: string): ProductCondition {
    const condition = PRODUCT_CONDITIONS.find((candidate) => candidate === value);
    if (!condition) {
        throw new RowMappingError(`Unknown product condition "${value}"`);
    }
    return condition;
}

function toNumber(value: NumericColumn, column: string): number {
    const parsed = typeof value === 'number' ? value : Number(value);
    if (!Number.isFinite(parsed)) {
        throw new RowMappingError(`${column} is not numeric: ${value}`);
    }
    return parsed;
}

function toNullableNumber(value: NumericColumn | null, column: string): number | null {
    return value === null ? null : toNumber(value, column);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function compareText(a: string, b: string): number {
    if (a === b) {
        return 0;
    }
    return a < b ? -1 : 1;
}

// --- domain -> row ---

export function toProductInsertRow(fields: ProductFields): ProductInsertRow {
    return {
        name: fields.name,
        slug: fields.slug,
        description: fields.description,
        summary: fields.summary,
        price_amount: fields.price.amount,
        price_currency: fields.price.currency,
        compare_at_price: fields.compareAtPrice,
        brand_id: fields.brandId,
        model: fields.model,
        sku: fields.sku,
        status: fields.status,
        stock: fields.stock,
        is_available: fields.isAvailable,
        is_new: fields.isNew,
        is_refurbished: fields.isRefurbished,
        condition: fields.condition,
        has_variants: fields.hasVariants,
        tags: fields.tags,
        attributes: fields.attributes.map(toAttributeJson),
        highlighted_features: fields.highlightedFeatures,
        warranty: fields.warranty ? toWarrantyJson(fields.warranty) : null,
        shipping: fields.shipping ? toShippingJson(fields.shipping) : null,
    };
}

/** Only the keys present in `changes` end up in the update payload. */
export function toProductUpdateRow(changes: Partial<ProductFields>): ProductUpdateRow {
    const row: ProductUpdateRow = {};
    if (changes.name !== undefined) row.name = changes.name;
    if (changes.slug !== undefined) row.slug = changes.slug;
    if (changes.description !== undefined) row.description = changes.description;
    if (changes.summary !== undefined) row.summary = changes.summary;
    if (changes.price !== undefined) {
        row.price_amount = changes.price.amount;
        row.price_currency = changes.price.currency;
    }
    if (changes.compareAtPrice !== undefined) row.compare_at_price = changes.compareAtPrice;
    if (changes.brandId !== undefined) row.brand_id = changes.brandId;
    if (changes.model !== undefined) row.model = changes.model;
    if (changes.sku !== undefined) row.sku = changes.sku;
    if (changes.status !== undefined) row.status = changes.status;
    if (changes.stock !== undefined) row.stock = changes.stock;
    if (changes.isAvailable !== undefined) row.is_available = changes.isAvailable;
    if (changes.isNew !== undefined) row.is_new = changes.isNew;
    if (changes.isRefurbished !== undefined) row.is_refurbished = changes.isRefurbished;
    if (changes.condition !== undefined) row.condition = changes.condition;
    if (changes.hasVariants !== undefined) row.has_variants = changes.hasVariants;
    if (changes.tags !== undefined) row.tags = changes.tags;
    if (changes.attributes !== undefined) row.attributes = changes.attributes.map(toAttributeJson);
    if (changes.highlightedFeatures !== undefined) row.highlighted_features = changes.highlightedFeatures;
    if (changes.warranty !== undefined) row.warranty = changes.warranty ? toWarrantyJson(changes.warranty) : null;
    if (changes.shipping !== undefined) row.shipping = changes.shipping ? toShippingJson(changes.shipping) : null;
    return row;
}

export function toImageInsertRow(productId: string, image: NewProductImage, variantId: string | null = null) {
    return {
        product_id: productId,
        variant_id: variantId,
        url: image.url,
        alt: image.alt,
        is_main: image.isMain,
        display_order: image.order,
    };
}

export function toVariantInsertRow(productId: string, variant: NewProductVariant) {
    return {
        product_id: productId,
        name: variant.name,
        sku: variant.sku,
        price_amount: variant.price.amount,
        price_currency: variant.price.currency,
        compare_at_price: variant.compareAtPrice,
        stock: variant.stock,
        is_available: variant.isAvailable,
        is_selected: variant.isSelected,
        attributes: variant.attributes,
    };
}

export function toConfigOptionInsertRow(productId: string, option: NewConfigOption) {
    const values: ConfigOptionValueJson[] = option.values.map((value) => ({
        ...(value.id ? { id: value.id } : {}),
        value: value.value,
        is_available: value.isAvailable,
        is_selected: value.isSelected,
        image: value.image,
    }));
    return { product_id: productId, name: option.name, values };
}

function toAttributeJson(attribute: ProductAttribute): AttributeJson {
    return {
        ...(attribute.id ? { id: attribute.id } : {}),
        name: attribute.name,
        value: attribute.value,
        display_value: attribute.displayValue,
        is_highlighted: attribute.isHighlighted,
        group_name: attribute.groupName,
    };
}

function toWarrantyJson(warranty: Warranty): WarrantyJson {
    return {
        has_warranty: warranty.hasWarranty,
        length: warranty.length,
        unit: warranty.unit,
        type: warranty.type,
        description: warranty.description,
    };
}

function toDeliveryEstimateJson(estimate: DeliveryEstimate | null): DeliveryEstimateJson | null {
    return estimate ? { min: estimate.min, max: estimate.max, unit: estimate.unit } : null;
}

function toShippingJson(shipping: Shipping): ShippingJson {
    return {
        is_free: shipping.isFree,
        estimated_delivery_time: toDeliveryEstimateJson(shipping.estimatedDeliveryTime),
        available_shipping_methods: shipping.availableShippingMethods.map((method) => ({
            id: method.id,
            name: method.name,
            cost: method.cost,
            estimated_delivery_time: toDeliveryEstimateJson(method.estimatedDeliveryTime),
        })),
    };
}

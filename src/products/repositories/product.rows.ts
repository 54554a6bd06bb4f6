// Row shapes as PostgREST returns them. Numeric columns may arrive as strings.

export type NumericColumn = number | string;

export interface ProductRow {
    id: string;
    name: string;
    slug: string;
    description: string;
    summary: string | null;
    price_amount: NumericColumn;
    price_currency: string;
    compare_at_price: NumericColumn | null;
    brand_id: string | null;
    model: string | null;
    sku: string;
    status: string;
    stock: number;
    is_available: boolean;
    is_new: boolean;
    is_refurbished: boolean;
    condition: string;
    has_variants: boolean;
    tags: string[] | null;
    attributes: unknown; // jsonb array of AttributeJson
    highlighted_features: string[] | null;
    warranty: unknown;
    shipping: unknown;
    created_at: string;
    updated_at: string;
}

export interface BrandSummaryRow {
    id: string;
    name: string;
    logo: string | null;
}

export interface CategorySummaryRow {
    id: string;
    name: string;
    slug: string;
    parent_id: string | null;
}

export interface ProductImageRow {
    id: string;
    product_id: string;
    variant_id: string | null;
    url: string;
    alt: string | null;
    is_main: boolean;
    display_order: number;
    created_at: string;
}

export interface ProductVariantRow {
    id: string;
    product_id: string;
    name: string;
    sku: string;
    price_amount: NumericColumn;
    price_currency: string;
    compare_at_price: NumericColumn | null;
    stock: number;
    is_available: boolean;
    is_selected: boolean;
    attributes: unknown; // jsonb object of string values
    images?: ProductImageRow[] | null;
}

export interface ConfigOptionRow {
    id: string;
    product_id: string;
    name: string;
    values: unknown; // jsonb array of ConfigOptionValueJson
}

export interface ProductReviewRow {
    id: string;
    product_id: string;
    user_id: string;
    user_name: string;
    rating: number;
    title: string | null;
    comment: string;
    is_verified_purchase: boolean;
    likes: number;
    created_at: string;
}

/** A product row with whatever relations the select string embedded. */
export interface ProductRowWithRelations extends ProductRow {
    brand?: BrandSummaryRow | null;
    categories?: CategorySummaryRow[] | null;
    images?: ProductImageRow[] | null;
    variants?: ProductVariantRow[] | null;
    config_options?: ConfigOptionRow[] | null;
    reviews?: ProductReviewRow[] | null;
}

// jsonb payloads, snake_case like the columns around them.

export interface AttributeJson {
    id?: string;
    name: string;
    value: string | number | boolean | null;
    display_value?: string;
    is_highlighted?: boolean;
    group_name?: string | null;
}

export interface ConfigOptionValueJson {
    id?: string;
    value: string;
    is_available?: boolean;
    is_selected?: boolean;
    image?: string | null;
}

export interface DeliveryEstimateJson {
    min: number;
    max: number;
    unit: string;
}

export interface WarrantyJson {
    has_warranty: boolean;
    length: number | null;
    unit: string | null;
    type: string | null;
    description: string | null;
}

export interface ShippingJson {
    is_free: boolean;
    estimated_delivery_time: DeliveryEstimateJson | null;
    available_shipping_methods: Array<{
        id: string;
        name: string;
        cost: number;
        estimated_delivery_time: DeliveryEstimateJson | null;
    }>;
}

/** Insert payload for the products table. */
export type ProductInsertRow = Omit<ProductRow, 'id' | 'created_at' | 'updated_at' | 'price_amount' | 'compare_at_price'> & {
    price_amount: number;
    compare_at_price: number | null;
    attributes: AttributeJson[];
    warranty: WarrantyJson | null;
    shipping: ShippingJson | null;
    tags: string[];
    highlighted_features: string[];
};

export type ProductUpdateRow = Partial<ProductInsertRow> & { updated_at?: string };

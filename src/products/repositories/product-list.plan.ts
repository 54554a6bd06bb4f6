import { PageRequest } from '../../common/types/page';
import { ProductCondition } from '../entities/product.entity';

export const SORTABLE_FIELDS = ['name', 'price', 'stock', 'sku', 'createdAt', 'updatedAt'] as const;
export type ProductSortField = (typeof SORTABLE_FIELDS)[number];
export type SortOrder = 'asc' | 'desc';

/** Listing filters; every absent key means "no constraint". */
export interface ProductListFilters {
    categoryId?: string;
    brandId?: string;
    priceMin?: number;
    priceMax?: number;
    search?: string;
    tags?: string[];
    isAvailable?: boolean;
    isNew?: boolean;
    condition?: ProductCondition;
    sortBy?: ProductSortField;
    sortOrder?: SortOrder;
}

export type FilterClause =
    | { kind: 'eq'; column: string; value: string | boolean }
    | { kind: 'gte'; column: string; value: number }
    | { kind: 'lte'; column: string; value: number }
    | { kind: 'contains'; column: string; values: string[] }
    | { kind: 'search'; columns: string[]; term: string };

export interface OrderClause {
    column: string;
    ascending: boolean;
}

/**
 * Storage-neutral description of one listing query. The Supabase repository
 * applies it to the PostgREST builder; the in-memory test repository evaluates it.
 */
export interface ProductListPlan {
    select: string;
    filters: FilterClause[];
    order: OrderClause[];
    range: { from: number; to: number };
}

export const SORT_COLUMNS: Record<ProductSortField, string> = {
    name: 'name',
    price: 'price_amount',
    stock: 'stock',
    sku: 'sku',
    createdAt: 'created_at',
    updatedAt: 'updated_at',
};

export const SEARCH_COLUMNS = ['name', 'description', 'sku'];

// Explicit FK hints: product_images also points at product_variants, which
// would otherwise make the variant and image embeds ambiguous.
const IMAGES_EMBED = 'images:product_images!product_images_product_id_fkey(*)';

export const PRODUCT_LIST_SELECT = [
    '*',
    'brand:brands(id, name, logo)',
    'categories(id, name, slug, parent_id)',
    IMAGES_EMBED,
].join(', ');

export const PRODUCT_DETAIL_SELECT = [
    PRODUCT_LIST_SELECT,
    'variants:product_variants!product_variants_product_id_fkey(*, images:product_images!product_images_variant_id_fkey(*))',
    'config_options(*)',
    'reviews:product_reviews(*)',
].join(', ');

// Inner-joined junction used only to filter; the categories embed stays complete.
export const CATEGORY_FILTER_EMBED = 'category_links:product_categories!inner(category_id)';
export const CATEGORY_FILTER_COLUMN = 'category_links.category_id';

export function buildProductListPlan(filters: ProductListFilters, page: PageRequest): ProductListPlan {
    const clauses: FilterClause[] = [];
    let select = PRODUCT_LIST_SELECT;

    if (filters.categoryId) {
        select = `${select}, ${CATEGORY_FILTER_EMBED}`;
        clauses.push({ kind: 'eq', column: CATEGORY_FILTER_COLUMN, value: filters.categoryId });
    }
    if (filters.brandId) {
        clauses.push({ kind: 'eq', column: 'brand_id', value: filters.brandId });
    }
    if (filters.priceMin !== undefined) {
        clauses.push({ kind: 'gte', column: 'price_amount', value: filters.priceMin });
    }
    if (filters.priceMax !== undefined) {
        clauses.push({ kind: 'lte', column: 'price_amount', value: filters.priceMax });
    }
    const term = filters.search?.trim();
    if (term) {
        clauses.push({ kind: 'search', columns: SEARCH_COLUMNS, term });
    }
    if (filters.tags && filters.tags.length > 0) {
        clauses.push({ kind: 'contains', column: 'tags', values: filters.tags });
    }
    if (filters.isAvailable !== undefined) {
        clauses.push({ kind: 'eq', column: 'is_available', value: filters.isAvailable });
    }
    if (filters.isNew !== undefined) {
        clauses.push({ kind: 'eq', column: 'is_new', value: filters.isNew });
    }
    if (filters.condition) {
        clauses.push({ kind: 'eq', column: 'condition', value: filters.condition });
    }

    const sortColumn = SORT_COLUMNS[filters.sortBy ?? 'createdAt'];
    // Without an explicit sort the newest products come first.
    const ascending = filters.sortBy ? filters.sortOrder !== 'desc' : filters.sortOrder === 'asc';

    return {
        select,
        filters: clauses,
        order: [
            { column: sortColumn, ascending },
            { column: 'id', ascending: true },
        ],
        range: { from: page.offset, to: page.offset + page.limit - 1 },
    };
}

/**
 * PostgREST `or` expression for a case-insensitive substring match.
 * LIKE wildcards in the term are escaped, then the pattern is double-quoted so
 * commas and parentheses survive the filter grammar.
 */
export function buildSearchExpression(columns: string[], term: string): string {
    const pattern = `%${term.replace(/[\\%_]/g, (char) => `\\${char}`)}%`;
    const quoted = `"${pattern.replace(/["\\]/g, (char) => `\\${char}`)}"`;
    return columns.map((column) => `${column}.ilike.${quoted}`).join(',');
}

import { Injectable, InternalServerErrorException, Logger } from '@nestjs/common';
import { PostgrestError } from '@supabase/supabase-js';
import { CatalogSupabaseClient, SupabaseService } from '../../common/supabase.service';
import { PageRequest, PageSlice } from '../../common/types/page';
import { BrandNotFoundError, CategoryNotFoundError } from '../../common/errors/catalog.errors';
import {
    isForeignKeyViolation,
    isUniqueViolation,
    parseMissingReference,
    toDuplicateValueError,
} from '../../common/utils/postgrest-errors';
import {
    NewConfigOption,
    NewProduct,
    NewProductImage,
    NewProductVariant,
    Product,
    ProductChanges,
    ProductCollections,
} from '../entities/product.entity';
import {
    buildProductListPlan,
    buildSearchExpression,
    PRODUCT_DETAIL_SELECT,
    ProductListFilters,
} from './product-list.plan';
import {
    toConfigOptionInsertRow,
    toImageInsertRow,
    toProduct,
    toProductInsertRow,
    toProductUpdateRow,
    toVariantInsertRow,
} from './product-row.mapper';
import { ProductRowWithRelations } from './product.rows';
import { ProductRepository } from './product.repository';

/**
 * PostgREST has no multi-statement transactions, so create and update write
 * the product row and its children as separate requests. A failed create
 * deletes the product row again; the cascade removes children already written.
 */
@Injectable()
export class SupabaseProductRepository implements ProductRepository {
    private readonly logger = new Logger(SupabaseProductRepository.name);

    constructor(private readonly supabaseService: SupabaseService) {}

    private getSupabaseClient(): CatalogSupabaseClient {
        return this.supabaseService.getClient();
    }

    async create(product: NewProduct): Promise<Product> {
        const supabase = this.getSupabaseClient();
        this.logger.log(`Creating product ${product.sku} (slug: ${product.slug})`);

        const { data, error } = await supabase
            .from('products')
            .insert(toProductInsertRow(product))
            .select('id')
            .single();

        if (error || !data) {
            this.raise('create product', 'product', error);
        }
        const productId: string = data.id;

        try {
            await this.insertCategoryLinks(supabase, productId, product.categoryIds);
            await this.insertImages(supabase, productId, product.images);
            await this.insertVariants(supabase, productId, product.variants);
            await this.insertConfigOptions(supabase, productId, product.configOptions);
        } catch (childError) {
            this.logger.warn(`Child insert failed for product ${productId}; removing the product row.`);
            await this.compensate(supabase, productId);
            throw childError;
        }

        return this.mustFind(productId);
    }

    async findById(id: string): Promise<Product | null> {
        return this.findOne('id', id);
    }

    async findBySku(sku: string): Promise<Product | null> {
        return this.findOne('sku', sku);
    }

    async findBySlug(slug: string): Promise<Product | null> {
        return this.findOne('slug', slug);
    }

    async update(id: string, changes: ProductChanges): Promise<Product | null> {
        const supabase = this.getSupabaseClient();
        const row = { ...toProductUpdateRow(changes), updated_at: new Date().toISOString() };

        const { data, error } = await supabase
            .from('products')
            .update(row)
            .eq('id', id)
            .select('id')
            .maybeSingle();

        if (error) {
            this.raise(`update product ${id}`, 'product', error);
        }
        if (!data) {
            return null;
        }

        await this.replaceCollections(supabase, id, changes);
        return this.mustFind(id);
    }

    async delete(id: string): Promise<boolean> {
        const supabase = this.getSupabaseClient();
        const { data, error } = await supabase.from('products').delete().eq('id', id).select('id');

        if (error) {
            this.raise(`delete product ${id}`, 'product', error);
        }
        const deleted: Array<{ id: string }> = data ?? [];
        return deleted.length > 0;
    }

    async list(filters: ProductListFilters, page: PageRequest): Promise<PageSlice<Product>> {
        const supabase = this.getSupabaseClient();
        const plan = buildProductListPlan(filters, page);

        let query = supabase.from('products').select(plan.select, { count: 'exact' });
        for (const clause of plan.filters) {
            switch (clause.kind) {
                case 'eq':
                    query = query.eq(clause.column, clause.value);
                    break;
                case 'gte':
                    query = query.gte(clause.column, clause.value);
                    break;
                case 'lte':
                    query = query.lte(clause.column, clause.value);
                    break;
                case 'contains':
                    query = query.contains(clause.column, clause.values);
                    break;
                case 'search':
                    query = query.or(buildSearchExpression(clause.columns, clause.term));
                    break;
            }
        }
        for (const order of plan.order) {
            query = query.order(order.column, { ascending: order.ascending });
        }

        const { data, error, count } = await query
            .range(plan.range.from, plan.range.to)
            .returns<ProductRowWithRelations[]>();
        if (error) {
            this.raise('list products', 'product', error);
        }
        const rows: ProductRowWithRelations[] = data ?? [];
        return { items: rows.map(toProduct), total: count ?? 0 };
    }

    private async findOne(column: 'id' | 'sku' | 'slug', value: string): Promise<Product | null> {
        const supabase = this.getSupabaseClient();
        const { data, error } = await supabase
            .from('products')
            .select(PRODUCT_DETAIL_SELECT)
            .eq(column, value)
            .returns<ProductRowWithRelations[]>()
            .maybeSingle();

        if (error) {
            this.raise(`fetch product by ${column}`, 'product', error);
        }
        if (!data) {
            return null;
        }
        return toProduct(data);
    }

    private async mustFind(id: string): Promise<Product> {
        const product = await this.findById(id);
        if (!product) {
            this.logger.error(`Product ${id} vanished between write and re-read.`);
            throw new InternalServerErrorException('Could not load product after write');
        }
        return product;
    }

    private async replaceCollections(supabase: CatalogSupabaseClient, productId: string, changes: Partial<ProductCollections>): Promise<void> {
        if (changes.categoryIds !== undefined) {
            await this.deleteChildren(supabase, 'product_categories', productId);
            await this.insertCategoryLinks(supabase, productId, changes.categoryIds);
        }
        if (changes.images !== undefined) {
            const { error } = await supabase
                .from('product_images')
                .delete()
                .eq('product_id', productId)
                .is('variant_id', null);
            if (error) {
                this.raise(`clear images of product ${productId}`, 'product image', error);
            }
            await this.insertImages(supabase, productId, changes.images);
        }
        if (changes.variants !== undefined) {
            // Variant images go with their variant through the cascade.
            await this.deleteChildren(supabase, 'product_variants', productId);
            await this.insertVariants(supabase, productId, changes.variants);
        }
        if (changes.configOptions !== undefined) {
            await this.deleteChildren(supabase, 'config_options', productId);
            await this.insertConfigOptions(supabase, productId, changes.configOptions);
        }
    }

    private async deleteChildren(supabase: CatalogSupabaseClient, table: string, productId: string): Promise<void> {
        const { error } = await supabase.from(table).delete().eq('product_id', productId);
        if (error) {
            this.raise(`clear ${table} of product ${productId}`, table, error);
        }
    }

    private async insertCategoryLinks(supabase: CatalogSupabaseClient, productId: string, categoryIds: string[]): Promise<void> {
        const unique = [...new Set(categoryIds)];
        if (unique.length === 0) {
            return;
        }
        const { error } = await supabase
            .from('product_categories')
            .insert(unique.map((categoryId) => ({ product_id: productId, category_id: categoryId })));
        if (error) {
            this.raise(`link categories to product ${productId}`, 'product category', error);
        }
    }

    private async insertImages(
        supabase: CatalogSupabaseClient,
        productId: string,
        images: NewProductImage[],
        variantId: string | null = null,
    ): Promise<void> {
        if (images.length === 0) {
            return;
        }
        const { error } = await supabase
            .from('product_images')
            .insert(images.map((image) => toImageInsertRow(productId, image, variantId)));
        if (error) {
            this.raise(`insert images for product ${productId}`, 'product image', error);
        }
    }

    private async insertVariants(supabase: CatalogSupabaseClient, productId: string, variants: NewProductVariant[]): Promise<void> {
        for (const variant of variants) {
            const { data, error } = await supabase
                .from('product_variants')
                .insert(toVariantInsertRow(productId, variant))
                .select('id')
                .single();
            if (error || !data) {
                this.raise(`insert variant ${variant.sku}`, 'product variant', error);
            }
            const variantId: string = data.id;
            await this.insertImages(supabase, productId, variant.images, variantId);
        }
    }

    private async insertConfigOptions(supabase: CatalogSupabaseClient, productId: string, options: NewConfigOption[]): Promise<void> {
        if (options.length === 0) {
            return;
        }
        const { error } = await supabase
            .from('config_options')
            .insert(options.map((option) => toConfigOptionInsertRow(productId, option)));
        if (error) {
            this.raise(`insert config options for product ${productId}`, 'config option', error);
        }
    }

    private async compensate(supabase: CatalogSupabaseClient, productId: string): Promise<void> {
        const { error } = await supabase.from('products').delete().eq('id', productId);
        if (error) {
            this.logger.error(`Failed to remove partially created product ${productId}: ${error.message}`);
        }
    }

    private raise(operation: string, entity: string, error: PostgrestError | null): never {
        if (error && isUniqueViolation(error)) {
            throw toDuplicateValueError(entity, error);
        }
        // A brand or category removed after the service checked it.
        const missing = error && isForeignKeyViolation(error) ? parseMissingReference(error) : null;
        if (missing?.field === 'brand_id') {
            throw new BrandNotFoundError(missing.value);
        }
        if (missing?.field === 'category_id') {
            throw new CategoryNotFoundError(missing.value);
        }
        this.logger.error(`Could not ${operation}: ${error?.message ?? 'no row returned'}`, error?.details);
        throw new InternalServerErrorException(`Could not ${operation}`);
    }
}

import { Inject, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { BrandsService } from '../brands/brands.service';
import { CategoriesService } from '../categories/categories.service';
import { CatalogSettings } from '../common/catalog-settings.service';
import { ProductNotFoundError } from '../common/errors/catalog.errors';
import { CatalogEventsService } from '../common/events/catalog-events.service';
import { Page } from '../common/types/page';
import { slugify, writeWithUniqueSlug } from '../common/utils/slug.util';
import { CreateProductDto } from './dto/create-product.dto';
import {
    ListProductsQueryDto,
    ProductFilterQueryDto,
    SearchProductsQueryDto,
} from './dto/list-products-query.dto';
import {
    ConfigOptionDto,
    ProductAttributeDto,
    ProductImageDto,
    ProductVariantDto,
    ShippingDto,
    WarrantyDto,
} from './dto/product-parts.dto';
import { ProductResponse, toProductResponse } from './dto/product-response.dto';
import { UpdateProductDto } from './dto/update-product.dto';
import {
    assertProductInvariants,
    NewConfigOption,
    NewProduct,
    NewProductImage,
    NewProductVariant,
    Product,
    ProductAttribute,
    ProductChanges,
    Shipping,
    Warranty,
} from './entities/product.entity';
import { ProductListFilters } from './repositories/product-list.plan';
import { PRODUCT_REPOSITORY, ProductRepository } from './repositories/product.repository';

@Injectable()
export class ProductsService {
    private readonly logger = new Logger(ProductsService.name);

    constructor(
        @Inject(PRODUCT_REPOSITORY) private readonly products: ProductRepository,
        private readonly categoriesService: CategoriesService,
        private readonly brandsService: BrandsService,
        private readonly settings: CatalogSettings,
        private readonly events: CatalogEventsService,
    ) {}

    async create(dto: CreateProductDto): Promise<ProductResponse> {
        await this.assertReferencesExist(dto.brandId, dto.categoryIds);

        const currency = dto.currency ?? this.settings.defaultCurrency;
        const fields: Omit<NewProduct, 'slug'> = {
            name: dto.name.trim(),
            description: dto.description ?? '',
            summary: dto.summary ?? null,
            price: { amount: dto.price, currency },
            compareAtPrice: dto.compareAtPrice ?? null,
            sku: dto.sku,
            model: dto.model ?? null,
            status: dto.status ?? 'active',
            stock: dto.stock ?? 0,
            isAvailable: dto.isAvailable ?? true,
            isNew: dto.isNew ?? false,
            isRefurbished: dto.isRefurbished ?? false,
            condition: dto.condition ?? 'new',
            hasVariants: dto.hasVariants ?? (dto.variants !== undefined && dto.variants.length > 0),
            brandId: dto.brandId ?? null,
            tags: dto.tags ?? [],
            attributes: toAttributes(dto.attributes ?? []),
            highlightedFeatures: dto.highlightedFeatures ?? [],
            warranty: dto.warranty ? toWarranty(dto.warranty) : null,
            shipping: dto.shipping ? toShipping(dto.shipping) : null,
            categoryIds: dto.categoryIds ?? [],
            images: toImages(dto.images ?? []),
            variants: (dto.variants ?? []).map((variant) => toVariant(variant, currency)),
            configOptions: toConfigOptions(dto.configOptions ?? []),
        };
        assertProductInvariants(fields);

        const product = await writeWithUniqueSlug(
            dto.slug ?? slugify(dto.name),
            !dto.slug,
            this.settings.slugMaxAttempts,
            (slug) => this.products.create({ ...fields, slug }),
        );

        this.logger.log(`Product ${product.id} created (sku: ${product.sku}, slug: ${product.slug})`);
        const response = toProductResponse(product);
        this.events.publish('product.created', product.id, { ...response });
        return response;
    }

    async findAll(query: ListProductsQueryDto): Promise<Page<ProductResponse>> {
        return this.list({ ...toFilters(query), categoryId: query.categoryId, search: query.search }, query);
    }

    async search(query: SearchProductsQueryDto): Promise<Page<ProductResponse>> {
        return this.list({ ...toFilters(query), categoryId: query.categoryId, search: query.query }, query);
    }

    async findByCategory(categoryId: string, query: ProductFilterQueryDto): Promise<Page<ProductResponse>> {
        await this.categoriesService.findOne(categoryId);
        return this.list({ ...toFilters(query), categoryId }, query);
    }

    async findOne(id: string): Promise<ProductResponse> {
        const product = await this.products.findById(id);
        if (!product) {
            throw new ProductNotFoundError(id);
        }
        return toProductResponse(product);
    }

    async findBySku(sku: string): Promise<ProductResponse> {
        const product = await this.products.findBySku(sku);
        if (!product) {
            throw new ProductNotFoundError(sku, 'SKU');
        }
        return toProductResponse(product);
    }

    async findBySlug(slug: string): Promise<ProductResponse> {
        const product = await this.products.findBySlug(slug);
        if (!product) {
            throw new ProductNotFoundError(slug, 'slug');
        }
        return toProductResponse(product);
    }

    async update(id: string, dto: UpdateProductDto): Promise<ProductResponse> {
        const existing = await this.products.findById(id);
        if (!existing) {
            throw new ProductNotFoundError(id);
        }
        await this.assertReferencesExist(dto.brandId, dto.categoryIds);

        const changes = toChanges(dto, existing);
        assertProductInvariants({
            name: changes.name ?? existing.name,
            price: changes.price ?? existing.price,
            stock: changes.stock ?? existing.stock,
            compareAtPrice: changes.compareAtPrice !== undefined ? changes.compareAtPrice : existing.compareAtPrice,
            variants: changes.variants,
        });

        const updated = await this.products.update(id, changes);
        if (!updated) {
            throw new ProductNotFoundError(id);
        }

        this.logger.log(`Product ${id} updated (${Object.keys(changes).join(', ') || 'no fields'})`);
        const response = toProductResponse(updated);
        this.events.publish('product.updated', id, { ...response }, { ...toProductResponse(existing) });
        return response;
    }

    async remove(id: string): Promise<boolean> {
        const existing = await this.products.findById(id);
        const deleted = await this.products.delete(id);
        if (deleted) {
            this.logger.log(`Product ${id} deleted`);
            this.events.publish('product.deleted', id, existing ? { ...toProductResponse(existing) } : { id });
        }
        return deleted;
    }

    private async list(filters: ProductListFilters, query: { limit?: number; offset?: number }): Promise<Page<ProductResponse>> {
        const page = this.settings.pageRequest(query.limit, query.offset);
        const { items, total } = await this.products.list(filters, page);
        return { items: items.map(toProductResponse), total, ...page };
    }

    private async assertReferencesExist(brandId: string | null | undefined, categoryIds: string[] | null | undefined): Promise<void> {
        if (brandId) {
            await this.brandsService.findOne(brandId);
        }
        if (categoryIds && categoryIds.length > 0) {
            await this.categoriesService.assertAllExist(categoryIds);
        }
    }
}

function toFilters(query: ProductFilterQueryDto): ProductListFilters {
    return {
        brandId: query.brandId,
        priceMin: query.priceMin,
        priceMax: query.priceMax,
        tags: query.tags,
        isAvailable: query.isAvailable,
        isNew: query.isNew,
        condition: query.condition,
        sortBy: query.sortBy,
        sortOrder: query.sortOrder,
    };
}

/** Builds a partial change set; null on a required field counts as absent. */
function toChanges(dto: UpdateProductDto, existing: Product): ProductChanges {
    const changes: ProductChanges = {};
    const currency = dto.currency ?? existing.price.currency;

    if (dto.name !== undefined && dto.name !== null) changes.name = dto.name.trim();
    if (dto.slug !== undefined && dto.slug !== null) changes.slug = dto.slug;
    if (dto.description !== undefined && dto.description !== null) changes.description = dto.description;
    if (dto.summary !== undefined) changes.summary = dto.summary;
    if ((dto.price !== undefined && dto.price !== null) || dto.currency !== undefined) {
        changes.price = { amount: dto.price ?? existing.price.amount, currency };
    }
    if (dto.compareAtPrice !== undefined) changes.compareAtPrice = dto.compareAtPrice;
    if (dto.sku !== undefined && dto.sku !== null) changes.sku = dto.sku;
    if (dto.model !== undefined) changes.model = dto.model;
    if (dto.status !== undefined && dto.status !== null) changes.status = dto.status;
    if (dto.stock !== undefined && dto.stock !== null) changes.stock = dto.stock;
    if (dto.isAvailable !== undefined && dto.isAvailable !== null) changes.isAvailable = dto.isAvailable;
    if (dto.isNew !== undefined && dto.isNew !== null) changes.isNew = dto.isNew;
    if (dto.isRefurbished !== undefined && dto.isRefurbished !== null) changes.isRefurbished = dto.isRefurbished;
    if (dto.condition !== undefined && dto.condition !== null) changes.condition = dto.condition;
    if (dto.hasVariants !== undefined && dto.hasVariants !== null) changes.hasVariants = dto.hasVariants;
    if (dto.brandId !== undefined) changes.brandId = dto.brandId;
    if (dto.tags !== undefined) changes.tags = dto.tags ?? [];
    if (dto.attributes !== undefined) changes.attributes = toAttributes(dto.attributes ?? []);
    if (dto.highlightedFeatures !== undefined) changes.highlightedFeatures = dto.highlightedFeatures ?? [];
    if (dto.warranty !== undefined) changes.warranty = dto.warranty ? toWarranty(dto.warranty) : null;
    if (dto.shipping !== undefined) changes.shipping = dto.shipping ? toShipping(dto.shipping) : null;
    if (dto.categoryIds !== undefined) changes.categoryIds = dto.categoryIds ?? [];
    if (dto.images !== undefined) changes.images = toImages(dto.images ?? []);
    if (dto.variants !== undefined) changes.variants = (dto.variants ?? []).map((variant) => toVariant(variant, currency));
    if (dto.configOptions !== undefined) changes.configOptions = toConfigOptions(dto.configOptions ?? []);
    return changes;
}

// Attribute and option-value ids are assigned once, on write, so reads return stable ids.
function toAttributes(attributes: ProductAttributeDto[]): ProductAttribute[] {
    return attributes.map((attribute) => ({
        id: uuidv4(),
        name: attribute.name,
        value: attribute.value,
        displayValue: attribute.displayValue ?? String(attribute.value ?? ''),
        isHighlighted: attribute.isHighlighted ?? false,
        groupName: attribute.groupName ?? null,
    }));
}

function toConfigOptions(options: ConfigOptionDto[]): NewConfigOption[] {
    return options.map((option) => ({
        name: option.name,
        values: option.values.map((value) => ({
            id: uuidv4(),
            value: value.value,
            isAvailable: value.isAvailable ?? true,
            isSelected: value.isSelected ?? false,
            image: value.image ?? null,
        })),
    }));
}

// Without an explicit order, images keep the order they were sent in.
function toImages(images: ProductImageDto[]): NewProductImage[] {
    return images.map((image, index) => ({
        url: image.url,
        alt: image.alt ?? null,
        isMain: image.isMain ?? false,
        order: image.order ?? index,
    }));
}

function toVariant(variant: ProductVariantDto, currency: string): NewProductVariant {
    return {
        sku: variant.sku,
        name: variant.name,
        price: { amount: variant.price, currency: variant.currency ?? currency },
        compareAtPrice: variant.compareAtPrice ?? null,
        stock: variant.stock ?? 0,
        isAvailable: variant.isAvailable ?? true,
        isSelected: variant.isSelected ?? false,
        attributes: variant.attributes ?? {},
        images: toImages(variant.images ?? []),
    };
}

function toWarranty(warranty: WarrantyDto): Warranty {
    return {
        hasWarranty: warranty.hasWarranty,
        length: warranty.length ?? null,
        unit: warranty.unit ?? null,
        type: warranty.type ?? null,
        description: warranty.description ?? null,
    };
}

function toShipping(shipping: ShippingDto): Shipping {
    return {
        isFree: shipping.isFree,
        estimatedDeliveryTime: shipping.estimatedDeliveryTime ?? null,
        availableShippingMethods: (shipping.availableShippingMethods ?? []).map((method) => ({
            id: method.id,
            name: method.name,
            cost: method.cost,
            estimatedDeliveryTime: method.estimatedDeliveryTime ?? null,
        })),
    };
}

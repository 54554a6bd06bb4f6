import { Inject, Injectable, Logger } from '@nestjs/common';
import { CatalogSettings } from '../common/catalog-settings.service';
import { CategoryNotFoundError, InvalidEntityError } from '../common/errors/catalog.errors';
import { CatalogEventsService } from '../common/events/catalog-events.service';
import { Page } from '../common/types/page';
import { slugify, writeWithUniqueSlug } from '../common/utils/slug.util';
import { CreateCategoryDto, UpdateCategoryDto } from './dto/category.dto';
import { assertValidCategoryName, Category, CategoryChanges } from './entities/category.entity';
import { CATEGORY_REPOSITORY, CategoryRepository } from './repositories/category.repository';

// Bounds the ancestor walk when checking for cycles.
const MAX_CATEGORY_DEPTH = 100;

@Injectable()
export class CategoriesService {
    private readonly logger = new Logger(CategoriesService.name);

    constructor(
        @Inject(CATEGORY_REPOSITORY) private readonly categories: CategoryRepository,
        private readonly settings: CatalogSettings,
        private readonly events: CatalogEventsService,
    ) {}

    async create(dto: CreateCategoryDto): Promise<Category> {
        assertValidCategoryName(dto.name);
        const parentId = dto.parentId ?? null;
        if (parentId) {
            await this.findOne(parentId);
        }

        const category = await writeWithUniqueSlug(
            dto.slug ?? slugify(dto.name),
            !dto.slug,
            this.settings.slugMaxAttempts,
            (slug) => this.categories.create({
                name: dto.name.trim(),
                slug,
                description: dto.description ?? null,
                parentId,
            }),
        );

        this.logger.log(`Category ${category.id} created (slug: ${category.slug})`);
        this.events.publish('category.created', category.id, { ...category });
        return category;
    }

    async findAll(limit?: number, offset?: number): Promise<Page<Category>> {
        const page = this.settings.pageRequest(limit, offset);
        const { items, total } = await this.categories.list(page);
        return { items, total, ...page };
    }

    async findOne(id: string): Promise<Category> {
        const category = await this.categories.findById(id);
        if (!category) {
            throw new CategoryNotFoundError(id);
        }
        return category;
    }

    async findBySlug(slug: string): Promise<Category> {
        const category = await this.categories.findBySlug(slug);
        if (!category) {
            throw new CategoryNotFoundError(slug, 'slug');
        }
        return category;
    }

    async findChildren(id: string): Promise<Category[]> {
        await this.findOne(id);
        return this.categories.findChildren(id);
    }

    /** Throws CategoryNotFoundError naming the first id that does not exist. */
    async assertAllExist(ids: string[]): Promise<void> {
        const missing = await this.categories.findMissingIds(ids);
        if (missing.length > 0) {
            throw new CategoryNotFoundError(missing[0]);
        }
    }

    async update(id: string, dto: UpdateCategoryDto): Promise<Category> {
        const existing = await this.findOne(id);

        const changes: CategoryChanges = {};
        if (dto.name !== undefined && dto.name !== null) {
            assertValidCategoryName(dto.name);
            changes.name = dto.name.trim();
        }
        if (dto.slug !== undefined && dto.slug !== null) changes.slug = dto.slug;
        if (dto.description !== undefined) changes.description = dto.description;
        if (dto.parentId !== undefined) {
            if (dto.parentId) {
                await this.assertValidParent(id, dto.parentId);
            }
            changes.parentId = dto.parentId;
        }

        const updated = await this.categories.update(id, changes);
        if (!updated) {
            throw new CategoryNotFoundError(id);
        }
        this.events.publish('category.updated', id, { ...updated }, { ...existing });
        return updated;
    }

    async remove(id: string): Promise<boolean> {
        const existing = await this.categories.findById(id);
        const deleted = await this.categories.delete(id);
        if (deleted) {
            this.logger.log(`Category ${id} deleted; its children are now roots.`);
            this.events.publish('category.deleted', id, existing ? { ...existing } : { id });
        }
        return deleted;
    }

    private async assertValidParent(id: string, parentId: string): Promise<void> {
        if (parentId === id) {
            throw new InvalidEntityError('A category cannot be its own parent');
        }
        let current: Category | null = await this.findOne(parentId);
        for (let depth = 0; current && depth < MAX_CATEGORY_DEPTH; depth++) {
            if (current.parentId === id) {
                throw new InvalidEntityError(`Category ${parentId} is a descendant of ${id} and cannot be its parent`);
            }
            current = current.parentId ? await this.categories.findById(current.parentId) : null;
        }
    }
}

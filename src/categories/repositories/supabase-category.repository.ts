import { Injectable, InternalServerErrorException, Logger } from '@nestjs/common';
import { PostgrestError } from '@supabase/supabase-js';
import { CatalogSupabaseClient, SupabaseService } from '../../common/supabase.service';
import { PageRequest, PageSlice } from '../../common/types/page';
import { isUniqueViolation, toDuplicateValueError } from '../../common/utils/postgrest-errors';
import { Category, CategoryChanges, NewCategory } from '../entities/category.entity';
import { CategoryRepository } from './category.repository';

interface CategoryRow {
    id: string;
    name: string;
    slug: string;
    description: string | null;
    parent_id: string | null;
    created_at: string;
    updated_at: string;
}

function toCategory(row: CategoryRow): Category {
    return {
        id: row.id,
        name: row.name,
        slug: row.slug,
        description: row.description,
        parentId: row.parent_id,
        createdAt: row.created_at,
        updatedAt: row.updated_at,
    };
}

@Injectable()
export class SupabaseCategoryRepository implements CategoryRepository {
    private readonly logger = new Logger(SupabaseCategoryRepository.name);

    constructor(private readonly supabaseService: SupabaseService) {}

    private getSupabaseClient(): CatalogSupabaseClient {
        return this.supabaseService.getClient();
    }

    async create(category: NewCategory): Promise<Category> {
        const { data, error } = await this.getSupabaseClient()
            .from('categories')
            .insert({
                name: category.name,
                slug: category.slug,
                description: category.description,
                parent_id: category.parentId,
            })
            .select()
            .single();

        if (error || !data) {
            this.raise('create category', error);
        }
        const row: CategoryRow = data;
        this.logger.log(`Category created with ID: ${row.id}`);
        return toCategory(row);
    }

    async findById(id: string): Promise<Category | null> {
        return this.findOne('id', id);
    }

    async findBySlug(slug: string): Promise<Category | null> {
        return this.findOne('slug', slug);
    }

    async findChildren(parentId: string): Promise<Category[]> {
        const { data, error } = await this.getSupabaseClient()
            .from('categories')
            .select('*')
            .eq('parent_id', parentId)
            .order('name', { ascending: true })
            .order('id', { ascending: true });

        if (error) {
            this.raise(`fetch children of category ${parentId}`, error);
        }
        const rows: CategoryRow[] = data ?? [];
        return rows.map(toCategory);
    }

    async findMissingIds(ids: string[]): Promise<string[]> {
        const unique = [...new Set(ids)];
        if (unique.length === 0) {
            return [];
        }
        const { data, error } = await this.getSupabaseClient()
            .from('categories')
            .select('id')
            .in('id', unique);

        if (error) {
            this.raise('check category ids', error);
        }
        const found: Array<{ id: string }> = data ?? [];
        const existing = new Set(found.map((row) => row.id));
        return unique.filter((id) => !existing.has(id));
    }

    async list(page: PageRequest): Promise<PageSlice<Category>> {
        const { data, error, count } = await this.getSupabaseClient()
            .from('categories')
            .select('*', { count: 'exact' })
            .order('name', { ascending: true })
            .order('id', { ascending: true })
            .range(page.offset, page.offset + page.limit - 1);

        if (error) {
            this.raise('list categories', error);
        }
        const rows: CategoryRow[] = data ?? [];
        return { items: rows.map(toCategory), total: count ?? 0 };
    }

    async update(id: string, changes: CategoryChanges): Promise<Category | null> {
        const row: Partial<Omit<CategoryRow, 'id' | 'created_at'>> = { updated_at: new Date().toISOString() };
        if (changes.name !== undefined) row.name = changes.name;
        if (changes.slug !== undefined) row.slug = changes.slug;
        if (changes.description !== undefined) row.description = changes.description;
        if (changes.parentId !== undefined) row.parent_id = changes.parentId;

        const { data, error } = await this.getSupabaseClient()
            .from('categories')
            .update(row)
            .eq('id', id)
            .select()
            .maybeSingle();

        if (error) {
            this.raise(`update category ${id}`, error);
        }
        if (!data) {
            return null;
        }
        const updated: CategoryRow = data;
        return toCategory(updated);
    }

    async delete(id: string): Promise<boolean> {
        // parent_id of the children is set to null by the foreign key.
        const { data, error } = await this.getSupabaseClient()
            .from('categories')
            .delete()
            .eq('id', id)
            .select('id');

        if (error) {
            this.raise(`delete category ${id}`, error);
        }
        const deleted: Array<{ id: string }> = data ?? [];
        return deleted.length > 0;
    }

    private async findOne(column: 'id' | 'slug', value: string): Promise<Category | null> {
        const { data, error } = await this.getSupabaseClient()
            .from('categories')
            .select('*')
            .eq(column, value)
            .maybeSingle();

        if (error) {
            this.raise(`fetch category by ${column}`, error);
        }
        if (!data) {
            return null;
        }
        const row: CategoryRow = data;
        return toCategory(row);
    }

    private raise(operation: string, error: PostgrestError | null): never {
        if (error && isUniqueViolation(error)) {
            throw toDuplicateValueError('category', error);
        }
        this.logger.error(`Could not ${operation}: ${error?.message ?? 'no row returned'}`, error?.details);
        throw new InternalServerErrorException(`Could not ${operation}`);
    }
}

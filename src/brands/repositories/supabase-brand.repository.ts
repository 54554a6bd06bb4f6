import { Injectable, InternalServerErrorException, Logger } from '@nestjs/common';
import { PostgrestError } from '@supabase/supabase-js';
import { CatalogSupabaseClient, SupabaseService } from '../../common/supabase.service';
import { PageRequest, PageSlice } from '../../common/types/page';
import { isUniqueViolation, toDuplicateValueError } from '../../common/utils/postgrest-errors';
import { Brand, BrandChanges, NewBrand } from '../entities/brand.entity';
import { BrandRepository } from './brand.repository';

interface BrandRow {
    id: string;
    name: string;
    logo: string | null;
    description: string | null;
    created_at: string;
    updated_at: string;
}

function toBrand(row: BrandRow): Brand {
    return {
        id: row.id,
        name: row.name,
        logo: row.logo,
        description: row.description,
        createdAt: row.created_at,
        updatedAt: row.updated_at,
    };
}

@Injectable()
export class SupabaseBrandRepository implements BrandRepository {
    private readonly logger = new Logger(SupabaseBrandRepository.name);

    constructor(private readonly supabaseService: SupabaseService) {}

    private getSupabaseClient(): CatalogSupabaseClient {
        return this.supabaseService.getClient();
    }

    async create(brand: NewBrand): Promise<Brand> {
        const { data, error } = await this.getSupabaseClient()
            .from('brands')
            .insert({ name: brand.name, logo: brand.logo, description: brand.description })
            .select()
            .single();

        if (error || !data) {
            this.raise('create brand', error);
        }
        const row: BrandRow = data;
        this.logger.log(`Brand created with ID: ${row.id}`);
        return toBrand(row);
    }

    async findById(id: string): Promise<Brand | null> {
        return this.findOne('id', id);
    }

    async findByName(name: string): Promise<Brand | null> {
        return this.findOne('name', name);
    }

    async list(page: PageRequest): Promise<PageSlice<Brand>> {
        const { data, error, count } = await this.getSupabaseClient()
            .from('brands')
            .select('*', { count: 'exact' })
            .order('name', { ascending: true })
            .order('id', { ascending: true })
            .range(page.offset, page.offset + page.limit - 1);

        if (error) {
            this.raise('list brands', error);
        }
        const rows: BrandRow[] = data ?? [];
        return { items: rows.map(toBrand), total: count ?? 0 };
    }

    async update(id: string, changes: BrandChanges): Promise<Brand | null> {
        const row: Partial<Omit<BrandRow, 'id' | 'created_at'>> = { updated_at: new Date().toISOString() };
        if (changes.name !== undefined) row.name = changes.name;
        if (changes.logo !== undefined) row.logo = changes.logo;
        if (changes.description !== undefined) row.description = changes.description;

        const { data, error } = await this.getSupabaseClient()
            .from('brands')
            .update(row)
            .eq('id', id)
            .select()
            .maybeSingle();

        if (error) {
            this.raise(`update brand ${id}`, error);
        }
        if (!data) {
            return null;
        }
        const updated: BrandRow = data;
        return toBrand(updated);
    }

    async delete(id: string): Promise<boolean> {
        // products.brand_id is set to null by the foreign key.
        const { data, error } = await this.getSupabaseClient()
            .from('brands')
            .delete()
            .eq('id', id)
            .select('id');

        if (error) {
            this.raise(`delete brand ${id}`, error);
        }
        const deleted: Array<{ id: string }> = data ?? [];
        return deleted.length > 0;
    }

    private async findOne(column: 'id' | 'name', value: string): Promise<Brand | null> {
        const { data, error } = await this.getSupabaseClient()
            .from('brands')
            .select('*')
            .eq(column, value)
            .maybeSingle();

        if (error) {
            this.raise(`fetch brand by ${column}`, error);
        }
        if (!data) {
            return null;
        }
        const row: BrandRow = data;
        return toBrand(row);
    }

    private raise(operation: string, error: PostgrestError | null): never {
        if (error && isUniqueViolation(error)) {
            throw toDuplicateValueError('brand', error);
        }
        this.logger.error(`Could not ${operation}: ${error?.message ?? 'no row returned'}`, error?.details);
        throw new InternalServerErrorException(`Could not ${operation}`);
    }
}

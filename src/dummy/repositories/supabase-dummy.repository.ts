import { Injectable, InternalServerErrorException, Logger } from '@nestjs/common';
import { CatalogSupabaseClient, SupabaseService } from '../../common/supabase.service';
import { PageRequest, PageSlice } from '../../common/types/page';
import { Dummy } from '../entities/dummy.entity';
import { DummyRepository } from './dummy.repository';

@Injectable()
export class SupabaseDummyRepository implements DummyRepository {
    private readonly logger = new Logger(SupabaseDummyRepository.name);

    constructor(private readonly supabaseService: SupabaseService) {}

    private getSupabaseClient(): CatalogSupabaseClient {
        return this.supabaseService.getClient();
    }

    async create(name: string): Promise<Dummy> {
        const { data, error } = await this.getSupabaseClient()
            .from('dummies')
            .insert({ name })
            .select('id, name')
            .single();

        if (error || !data) {
            this.logger.error(`Failed to create dummy: ${error?.message}`);
            throw new InternalServerErrorException('Could not create dummy');
        }
        const dummy: Dummy = data;
        return dummy;
    }

    async findById(id: number): Promise<Dummy | null> {
        const { data, error } = await this.getSupabaseClient()
            .from('dummies')
            .select('id, name')
            .eq('id', id)
            .maybeSingle();

        if (error) {
            this.logger.error(`Error fetching dummy ${id}: ${error.message}`);
            throw new InternalServerErrorException('Could not fetch dummy');
        }
        const dummy: Dummy | null = data;
        return dummy;
    }

    async findByName(name: string): Promise<Dummy[]> {
        const { data, error } = await this.getSupabaseClient()
            .from('dummies')
            .select('id, name')
            .eq('name', name)
            .order('id', { ascending: true });

        if (error) {
            this.logger.error(`Error searching dummy by name: ${error.message}`);
            throw new InternalServerErrorException('Could not search dummies');
        }
        const rows: Dummy[] = data ?? [];
        return rows;
    }

    async list(page: PageRequest): Promise<PageSlice<Dummy>> {
        const { data, error, count } = await this.getSupabaseClient()
            .from('dummies')
            .select('id, name', { count: 'exact' })
            .order('id', { ascending: true })
            .range(page.offset, page.offset + page.limit - 1);

        if (error) {
            this.logger.error(`Error listing dummies: ${error.message}`);
            throw new InternalServerErrorException('Could not list dummies');
        }
        const rows: Dummy[] = data ?? [];
        return { items: rows, total: count ?? 0 };
    }
}

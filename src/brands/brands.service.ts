import { Inject, Injectable, Logger } from '@nestjs/common';
import { CatalogSettings } from '../common/catalog-settings.service';
import { BrandNotFoundError } from '../common/errors/catalog.errors';
import { CatalogEventsService } from '../common/events/catalog-events.service';
import { Page } from '../common/types/page';
import { CreateBrandDto, UpdateBrandDto } from './dto/brand.dto';
import { assertValidBrandName, Brand, BrandChanges } from './entities/brand.entity';
import { BRAND_REPOSITORY, BrandRepository } from './repositories/brand.repository';

@Injectable()
export class BrandsService {
    private readonly logger = new Logger(BrandsService.name);

    constructor(
        @Inject(BRAND_REPOSITORY) private readonly brands: BrandRepository,
        private readonly settings: CatalogSettings,
        private readonly events: CatalogEventsService,
    ) {}

    /** A duplicate name surfaces as DuplicateValueError from the unique constraint. */
    async create(dto: CreateBrandDto): Promise<Brand> {
        assertValidBrandName(dto.name);
        const brand = await this.brands.create({
            name: dto.name.trim(),
            logo: dto.logo ?? null,
            description: dto.description ?? null,
        });
        this.logger.log(`Brand ${brand.id} created (${brand.name})`);
        this.events.publish('brand.created', brand.id, { ...brand });
        return brand;
    }

    async findAll(limit?: number, offset?: number): Promise<Page<Brand>> {
        const page = this.settings.pageRequest(limit, offset);
        const { items, total } = await this.brands.list(page);
        return { items, total, ...page };
    }

    async findOne(id: string): Promise<Brand> {
        const brand = await this.brands.findById(id);
        if (!brand) {
            throw new BrandNotFoundError(id);
        }
        return brand;
    }

    async findByName(name: string): Promise<Brand> {
        const brand = await this.brands.findByName(name);
        if (!brand) {
            throw new BrandNotFoundError(name, 'name');
        }
        return brand;
    }

    async update(id: string, dto: UpdateBrandDto): Promise<Brand> {
        const existing = await this.findOne(id);

        const changes: BrandChanges = {};
        if (dto.name !== undefined && dto.name !== null) {
            assertValidBrandName(dto.name);
            changes.name = dto.name.trim();
        }
        if (dto.logo !== undefined) changes.logo = dto.logo;
        if (dto.description !== undefined) changes.description = dto.description;

        const updated = await this.brands.update(id, changes);
        if (!updated) {
            throw new BrandNotFoundError(id);
        }
        this.events.publish('brand.updated', id, { ...updated }, { ...existing });
        return updated;
    }

    async remove(id: string): Promise<boolean> {
        const existing = await this.brands.findById(id);
        const deleted = await this.brands.delete(id);
        if (deleted) {
            this.logger.log(`Brand ${id} deleted; its products keep no brand.`);
            this.events.publish('brand.deleted', id, existing ? { ...existing } : { id });
        }
        return deleted;
    }
}

import { Inject, Injectable, Logger } from '@nestjs/common';
import { CatalogSettings } from '../common/catalog-settings.service';
import { DummyNotFoundError } from '../common/errors/catalog.errors';
import { CatalogEventsService } from '../common/events/catalog-events.service';
import { Page } from '../common/types/page';
import { assertValidDummyName, Dummy } from './entities/dummy.entity';
import { DUMMY_REPOSITORY, DummyRepository } from './repositories/dummy.repository';

@Injectable()
export class DummyService {
    private readonly logger = new Logger(DummyService.name);

    constructor(
        @Inject(DUMMY_REPOSITORY) private readonly dummies: DummyRepository,
        private readonly settings: CatalogSettings,
        private readonly events: CatalogEventsService,
    ) {}

    async create(name: string): Promise<Dummy> {
        assertValidDummyName(name);
        const dummy = await this.dummies.create(name.trim());
        this.logger.log(`Dummy ${dummy.id} created`);
        this.events.publish('dummy.created', dummy.id, { ...dummy });
        return dummy;
    }

    async findAll(limit?: number, offset?: number): Promise<Page<Dummy>> {
        const page = this.settings.pageRequest(limit, offset);
        const { items, total } = await this.dummies.list(page);
        return { items, total, ...page };
    }

    async findOne(id: number): Promise<Dummy> {
        const dummy = await this.dummies.findById(id);
        if (!dummy) {
            throw new DummyNotFoundError(id);
        }
        return dummy;
    }

    /** Names are not unique; every exact match comes back, possibly none. */
    async findByName(name: string): Promise<Dummy[]> {
        return this.dummies.findByName(name);
    }
}

import { PageRequest, PageSlice } from '../../common/types/page';
import { Dummy } from '../entities/dummy.entity';

export const DUMMY_REPOSITORY = Symbol('DUMMY_REPOSITORY');

export interface DummyRepository {
    create(name: string): Promise<Dummy>;
    findById(id: number): Promise<Dummy | null>;
    findByName(name: string): Promise<Dummy[]>;
    list(page: PageRequest): Promise<PageSlice<Dummy>>;
}

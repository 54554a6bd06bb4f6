import { PageRequest, PageSlice } from '../../common/types/page';
import { Brand, BrandChanges, NewBrand } from '../entities/brand.entity';

export const BRAND_REPOSITORY = Symbol('BRAND_REPOSITORY');

export interface BrandRepository {
    create(brand: NewBrand): Promise<Brand>;
    findById(id: string): Promise<Brand | null>;
    findByName(name: string): Promise<Brand | null>;
    list(page: PageRequest): Promise<PageSlice<Brand>>;
    update(id: string, changes: BrandChanges): Promise<Brand | null>;
    delete(id: string): Promise<boolean>;
}

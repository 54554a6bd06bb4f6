import { PageRequest, PageSlice } from '../../common/types/page';
import { Category, CategoryChanges, NewCategory } from '../entities/category.entity';

export const CATEGORY_REPOSITORY = Symbol('CATEGORY_REPOSITORY');

export interface CategoryRepository {
    create(category: NewCategory): Promise<Category>;
    findById(id: string): Promise<Category | null>;
    findBySlug(slug: string): Promise<Category | null>;
    findChildren(parentId: string): Promise<Category[]>;
    /** Returns the subset of `ids` with no matching category, in input order. */
    findMissingIds(ids: string[]): Promise<string[]>;
    list(page: PageRequest): Promise<PageSlice<Category>>;
    update(id: string, changes: CategoryChanges): Promise<Category | null>;
    delete(id: string): Promise<boolean>;
}

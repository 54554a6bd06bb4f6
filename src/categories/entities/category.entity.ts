import { InvalidEntityError } from '../../common/errors/catalog.errors';

export interface Category {
    id: string;
    name: string;
    slug: string; // unique
    description: string | null;
    parentId: string | null; // null for root categories
    createdAt: string;
    updatedAt: string;
}

export type CategorySummary = Pick<Category, 'id' | 'name' | 'slug' | 'parentId'>;

export interface NewCategory {
    name: string;
    slug: string;
    description: string | null;
    parentId: string | null;
}

export type CategoryChanges = Partial<NewCategory>;

export function assertValidCategoryName(name: string): void {
    if (!name.trim()) {
        throw new InvalidEntityError('Category name cannot be empty');
    }
}

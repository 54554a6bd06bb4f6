import { InvalidEntityError } from '../../common/errors/catalog.errors';

export interface Brand {
    id: string;
    name: string; // unique
    logo: string | null;
    description: string | null;
    createdAt: string;
    updatedAt: string;
}

export type BrandSummary = Pick<Brand, 'id' | 'name' | 'logo'>;

export interface NewBrand {
    name: string;
    logo: string | null;
    description: string | null;
}

export type BrandChanges = Partial<NewBrand>;

export function assertValidBrandName(name: string): void {
    if (!name.trim()) {
        throw new InvalidEntityError('Brand name cannot be empty');
    }
}

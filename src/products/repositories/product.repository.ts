import { PageRequest, PageSlice } from '../../common/types/page';
import { NewProduct, Product, ProductChanges } from '../entities/product.entity';
import { ProductListFilters } from './product-list.plan';

export const PRODUCT_REPOSITORY = Symbol('PRODUCT_REPOSITORY');

export interface ProductRepository {
    /** Inserts the product and its children; throws DuplicateValueError on a unique violation. */
    create(product: NewProduct): Promise<Product>;
    findById(id: string): Promise<Product | null>;
    findBySku(sku: string): Promise<Product | null>;
    findBySlug(slug: string): Promise<Product | null>;
    /** Resolves to null when no product has this id. */
    update(id: string, changes: ProductChanges): Promise<Product | null>;
    delete(id: string): Promise<boolean>;
    list(filters: ProductListFilters, page: PageRequest): Promise<PageSlice<Product>>;
}

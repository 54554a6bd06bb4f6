import { InternalServerErrorException, Logger } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { newProduct, productRow } from '../../../test/support/product-rows';
import { SupabaseStub, uniqueViolation } from '../../../test/support/supabase-stub';
import { BrandNotFoundError, CategoryNotFoundError, DuplicateValueError } from '../../common/errors/catalog.errors';
import { SupabaseService } from '../../common/supabase.service';
import { CATEGORY_FILTER_EMBED, PRODUCT_DETAIL_SELECT, PRODUCT_LIST_SELECT } from './product-list.plan';
import { SupabaseProductRepository } from './supabase-product.repository';

describe('SupabaseProductRepository', () => {
  let stub: SupabaseStub;
  let repository: SupabaseProductRepository;

  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  beforeEach(async () => {
    stub = new SupabaseStub();
    const moduleRef = await Test.createTestingModule({
      providers: [
        SupabaseProductRepository,
        { provide: SupabaseService, useValue: { getClient: () => stub } },
      ],
    }).compile();
    repository = moduleRef.get(SupabaseProductRepository);
  });

  describe('list', () => {
    it('applies every filter of the plan to the query', async () => {
      stub.respond('products', { data: [productRow()], error: null, count: 21 });

      const page = await repository.list(
        { categoryId: 'c-1', priceMin: 10, search: 'phone', tags: ['sale'] },
        { limit: 10, offset: 20 },
      );

      expect(stub.recorded()).toEqual([{
        table: 'products',
        calls: [
          ['select', [`${PRODUCT_LIST_SELECT}, ${CATEGORY_FILTER_EMBED}`, { count: 'exact' }]],
          ['eq', ['category_links.category_id', 'c-1']],
          ['gte', ['price_amount', 10]],
          ['or', ['name.ilike."%phone%",description.ilike."%phone%",sku.ilike."%phone%"']],
          ['contains', ['tags', ['sale']]],
          ['order', ['created_at', { ascending: false }]],
          ['order', ['id', { ascending: true }]],
          ['range', [20, 29]],
        ],
      }]);
      expect(page.total).toBe(21);
      expect(page.items.map((item) => item.price.amount)).toEqual([99.99]);
    });

    it('reports zero when PostgREST returns no count', async () => {
      stub.respond('products', { data: [], error: null, count: null });

      await expect(repository.list({}, { limit: 10, offset: 0 })).resolves.toEqual({ items: [], total: 0 });
    });
  });

  describe('findBySku', () => {
    it('maps the detail row of the matching product', async () => {
      stub.respond('products', { data: productRow({ tags: ['sale'] }), error: null });

      const product = await repository.findBySku('TEST-123');

      expect(stub.recorded()).toEqual([{
        table: 'products',
        calls: [['select', [PRODUCT_DETAIL_SELECT]], ['eq', ['sku', 'TEST-123']], ['maybeSingle', []]],
      }]);
      expect(product?.sku).toBe('TEST-123');
      expect(product?.tags).toEqual(['sale']);
    });

    it('returns null when no row matches', async () => {
      stub.respond('products', { data: null, error: null });

      await expect(repository.findBySku('NOPE')).resolves.toBeNull();
    });
  });

  describe('create', () => {
    it('maps a unique violation to DuplicateValueError', async () => {
      stub.respond('products', { data: null, error: uniqueViolation('sku', 'TEST-123') });

      await expect(repository.create(newProduct())).rejects.toThrow(new DuplicateValueError('product', 'sku', 'TEST-123'));
    });

    it('removes the product row again when a child insert fails', async () => {
      stub.respond('products', { data: { id: 'p-1' }, error: null });
      stub.respond('product_categories', {
        data: null,
        error: { code: '23503', message: 'violates foreign key constraint', details: null, hint: null },
      });

      await expect(repository.create(newProduct({ categoryIds: ['c-1'] }))).rejects.toThrow(
        new InternalServerErrorException('Could not link categories to product p-1'),
      );

      const recorded = stub.recorded();
      expect(recorded.map((query) => query.table)).toEqual(['products', 'product_categories', 'products']);
      expect(recorded[1].calls).toEqual([['insert', [[{ product_id: 'p-1', category_id: 'c-1' }]]]]);
      expect(recorded[2].calls).toEqual([['delete', []], ['eq', ['id', 'p-1']]]);
    });

    it('reports a brand deleted before the insert as not found', async () => {
      stub.respond('products', {
        data: null,
        error: {
          code: '23503',
          message: 'insert or update on table "products" violates foreign key constraint "products_brand_id_fkey"',
          details: 'Key (brand_id)=(b-gone) is not present in table "brands".',
          hint: null,
        },
      });

      await expect(repository.create(newProduct({ brandId: 'b-gone' }))).rejects.toThrow(new BrandNotFoundError('b-gone'));
    });

    it('reports a category deleted before linking as not found and compensates', async () => {
      stub.respond('products', { data: { id: 'p-1' }, error: null });
      stub.respond('product_categories', {
        data: null,
        error: {
          code: '23503',
          message: 'insert or update on table "product_categories" violates foreign key constraint',
          details: 'Key (category_id)=(c-gone) is not present in table "categories".',
          hint: null,
        },
      });

      await expect(repository.create(newProduct({ categoryIds: ['c-gone'] }))).rejects.toThrow(
        new CategoryNotFoundError('c-gone'),
      );
      expect(stub.recorded().map((query) => query.table)).toEqual(['products', 'product_categories', 'products']);
    });

    it('writes variant images against the inserted variant', async () => {
      stub.respond('products', { data: { id: 'p-1' }, error: null }, { data: productRow(), error: null });
      stub.respond('product_variants', { data: { id: 'v-1' }, error: null });

      await repository.create(newProduct({
        hasVariants: true,
        variants: [{
          sku: 'TEST-123-L',
          name: 'Large',
          price: { amount: 109.99, currency: 'USD' },
          compareAtPrice: null,
          stock: 2,
          isAvailable: true,
          isSelected: false,
          attributes: { size: 'L' },
          images: [{ url: 'https://img.test/l.png', alt: null, isMain: true, order: 0 }],
        }],
      }));

      const imageInsert = stub.recorded().find((query) => query.table === 'product_images');
      expect(imageInsert?.calls).toEqual([['insert', [[{
        product_id: 'p-1',
        variant_id: 'v-1',
        url: 'https://img.test/l.png',
        alt: null,
        is_main: true,
        display_order: 0,
      }]]]]);
    });
  });

  describe('update', () => {
    it('returns null without touching children when the product is missing', async () => {
      stub.respond('products', { data: null, error: null });

      await expect(repository.update('p-404', { categoryIds: [] })).resolves.toBeNull();
      expect(stub.recorded().map((query) => query.table)).toEqual(['products']);
    });

    it('replaces only the product-level images', async () => {
      stub.respond('products', { data: { id: 'p-1' }, error: null }, { data: productRow(), error: null });

      await repository.update('p-1', { images: [{ url: 'https://img.test/new.png', alt: null, isMain: true, order: 0 }] });

      const imageQueries = stub.recorded().filter((query) => query.table === 'product_images');
      expect(imageQueries.map((query) => query.calls)).toEqual([
        [['delete', []], ['eq', ['product_id', 'p-1']], ['is', ['variant_id', null]]],
        [['insert', [[{
          product_id: 'p-1',
          variant_id: null,
          url: 'https://img.test/new.png',
          alt: null,
          is_main: true,
          display_order: 0,
        }]]]],
      ]);
    });
  });

  describe('delete', () => {
    it('reports whether a row was removed', async () => {
      stub.respond('products', { data: [{ id: 'p-1' }], error: null }, { data: [], error: null });

      await expect(repository.delete('p-1')).resolves.toBe(true);
      await expect(repository.delete('p-1')).resolves.toBe(false);
    });
  });
});

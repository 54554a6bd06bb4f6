import { createCatalogServices, CatalogServices } from '../../test/support/catalog-services';
import {
  CategoryNotFoundError,
  DuplicateValueError,
  InvalidEntityError,
  ProductNotFoundError,
} from '../common/errors/catalog.errors';
import { ProductsService } from './products.service';

describe('ProductsService', () => {
  let services: CatalogServices;
  let service: ProductsService;

  beforeEach(() => {
    services = createCatalogServices({ CATALOG_SLUG_MAX_ATTEMPTS: '3', CATALOG_MAX_PAGE_SIZE: '5', CATALOG_DEFAULT_CURRENCY: 'EUR' });
    service = services.products;
  });

  describe('create', () => {
    it('fills defaults and publishes product.created', async () => {
      const product = await service.create({ name: '  Desk Lamp ', price: 25, sku: 'LAMP-1' });

      expect(product).toMatchObject({
        name: 'Desk Lamp',
        slug: 'desk-lamp',
        description: '',
        summary: null,
        price: 25,
        currency: 'EUR',
        status: 'active',
        condition: 'new',
        stock: 0,
        isAvailable: true,
        isNew: false,
        hasVariants: false,
        tags: [],
      });
      expect(services.emitted).toHaveLength(1);
      expect(services.emitted[0]).toMatchObject({ eventType: 'product.created', aggregateId: product.id });
      expect(services.emitted[0].data.sku).toBe('LAMP-1');
    });

    it('rejects a name that is blank after trimming', async () => {
      await expect(service.create({ name: '   ', price: 1, sku: 'BLANK-1' })).rejects.toThrow(
        new InvalidEntityError('Product name cannot be empty'),
      );
      expect(services.catalog.products.size).toBe(0);
    });

    it('gives up on a derived slug after the configured number of attempts', async () => {
      await service.create({ name: 'Chair', price: 1, sku: 'CH-1' });
      await service.create({ name: 'Chair', price: 1, sku: 'CH-2' });
      await service.create({ name: 'Chair', price: 1, sku: 'CH-3' });

      await expect(service.create({ name: 'Chair', price: 1, sku: 'CH-4' })).rejects.toThrow(
        new DuplicateValueError('product', 'slug', 'chair-2'),
      );
    });

    it('names the missing category', async () => {
      const category = await services.categories.create({ name: 'Lighting' });
      const missing = '55555555-5555-4555-8555-555555555555';

      await expect(
        service.create({ name: 'Lamp', price: 1, sku: 'L-1', categoryIds: [category.id, missing] }),
      ).rejects.toThrow(new CategoryNotFoundError(missing));
    });

    it('prices variants in the product currency unless they carry their own', async () => {
      const product = await service.create({
        name: 'Shirt',
        price: 20,
        sku: 'SH-1',
        currency: 'GBP',
        variants: [
          { sku: 'SH-1-S', name: 'Small', price: 20 },
          { sku: 'SH-1-L', name: 'Large', price: 22, currency: 'USD' },
        ],
      });

      expect(product.variants.map((variant) => [variant.sku, variant.currency])).toEqual([
        ['SH-1-S', 'GBP'],
        ['SH-1-L', 'USD'],
      ]);
    });

    it('numbers images in the order they were sent', async () => {
      const product = await service.create({
        name: 'Poster',
        price: 5,
        sku: 'PO-1',
        images: [{ url: 'https://img.test/front.png' }, { url: 'https://img.test/back.png' }],
      });

      expect(product.images.map((image) => [image.url, image.order])).toEqual([
        ['https://img.test/front.png', 0],
        ['https://img.test/back.png', 1],
      ]);
    });
  });

  describe('update', () => {
    it('treats null on a required field as absent', async () => {
      const created = await service.create({ name: 'Table', price: 100, sku: 'T-1', compareAtPrice: 120 });

      const updated = await service.update(created.id, { name: null, compareAtPrice: null });

      expect(updated.name).toBe('Table');
      expect(updated.compareAtPrice).toBeNull();
    });

    it('changes the currency without touching the amount', async () => {
      const created = await service.create({ name: 'Table', price: 100, sku: 'T-1' });

      const updated = await service.update(created.id, { currency: 'USD' });

      expect([updated.price, updated.currency]).toEqual([100, 'USD']);
    });

    it('keeps the slug when the name changes', async () => {
      const created = await service.create({ name: 'Table', price: 100, sku: 'T-1' });

      const updated = await service.update(created.id, { name: 'Dining Table' });

      expect([updated.name, updated.slug]).toEqual(['Dining Table', 'table']);
    });

    it('publishes the previous state alongside the new one', async () => {
      const created = await service.create({ name: 'Table', price: 100, sku: 'T-1' });

      await service.update(created.id, { stock: 4 });

      const event = services.emitted[1];
      expect(event.eventType).toBe('product.updated');
      expect(event.data.stock).toBe(4);
      expect(event.previousData?.stock).toBe(0);
    });

    it('rejects a negative compare-at price against the stored values', async () => {
      const created = await service.create({ name: 'Table', price: 100, sku: 'T-1' });

      await expect(service.update(created.id, { compareAtPrice: -5 })).rejects.toThrow(
        new InvalidEntityError('Compare-at price cannot be negative'),
      );
    });

    it('throws ProductNotFoundError for an unknown id', async () => {
      await expect(service.update('missing-id', { stock: 1 })).rejects.toThrow(new ProductNotFoundError('missing-id'));
    });
  });

  describe('remove', () => {
    it('returns false and publishes nothing when the product is missing', async () => {
      await expect(service.remove('missing-id')).resolves.toBe(false);
      expect(services.emitted).toEqual([]);
    });

    it('publishes product.deleted with the removed product', async () => {
      const created = await service.create({ name: 'Table', price: 100, sku: 'T-1' });

      await expect(service.remove(created.id)).resolves.toBe(true);

      expect(services.emitted[1]).toMatchObject({ eventType: 'product.deleted', aggregateId: created.id });
      expect(services.emitted[1].data.sku).toBe('T-1');
    });
  });

  describe('listing', () => {
    it('clamps the page size to the configured maximum', async () => {
      const page = await service.findAll({ limit: 50 });

      expect(page).toEqual({ items: [], total: 0, limit: 5, offset: 0 });
    });

    it('rejects an unknown category on the category route', async () => {
      await expect(service.findByCategory('missing-id', {})).rejects.toThrow(new CategoryNotFoundError('missing-id'));
    });

    it('combines the search term with the other filters', async () => {
      await service.create({ name: 'Red Phone', price: 300, sku: 'RP-1' });
      await service.create({ name: 'Blue Phone', price: 900, sku: 'BP-1' });
      await service.create({ name: 'Red Chair', price: 50, sku: 'RC-1' });

      const page = await service.search({ query: 'phone', priceMax: 500 });

      expect(page.items.map((item) => item.sku)).toEqual(['RP-1']);
      expect(page.total).toBe(1);
    });
  });
});

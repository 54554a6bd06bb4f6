import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { InMemoryCatalog } from './support/in-memory-catalog';
import { createTestApp } from './support/test-app';

describe('Catalog (e2e)', () => {
  let app: INestApplication;
  let catalog: InMemoryCatalog;

  beforeEach(async () => {
    ({ app, catalog } = await createTestApp());
  });

  afterEach(async () => {
    await app.close();
  });

  const post = (path: string, body: Record<string, unknown>) => request(app.getHttpServer()).post(path).send(body);

  describe('health and echo', () => {
    it('reports the service as up', async () => {
      const res = await request(app.getHttpServer()).get('/api/health').expect(200);

      expect(res.body.status).toBe('ok');
      expect(typeof res.body.version).toBe('string');
    });

    it('echoes the message back', async () => {
      const res = await post('/api/echo', { message: 'hello' }).expect(200);

      expect(res.body).toEqual({ message: 'hello' });
    });

    it('rejects an echo body with unknown fields', async () => {
      const res = await post('/api/echo', { message: 'hello', extra: 1 }).expect(422);

      expect(res.body).toEqual({ statusCode: 422, detail: 'extra: property extra should not exist' });
    });
  });

  describe('categories', () => {
    it('creates a root category with a derived slug', async () => {
      const res = await post('/api/categories', { name: 'Home & Garden' }).expect(201);

      expect(res.body).toMatchObject({ name: 'Home & Garden', slug: 'home-garden', parentId: null, description: null });
    });

    it('rejects a category name that is only whitespace', async () => {
      const created = await post('/api/categories', { name: 'Toys' }).expect(201);

      const res = await post('/api/categories', { name: '   ' }).expect(422);
      const renamed = await request(app.getHttpServer())
        .put(`/api/categories/${created.body.id}`)
        .send({ name: '  ' })
        .expect(422);

      expect(res.body).toEqual({ statusCode: 422, detail: 'Category name cannot be empty' });
      expect(renamed.body.detail).toBe('Category name cannot be empty');
    });

    it('answers 404 when the parent does not exist', async () => {
      const missing = '22222222-2222-4222-8222-222222222222';
      const res = await post('/api/categories', { name: 'Orphan', parentId: missing }).expect(404);

      expect(res.body.detail).toBe(`Category with ID ${missing} not found`);
    });

    it('lists children and finds a category by slug', async () => {
      const parent = await post('/api/categories', { name: 'Electronics' }).expect(201);
      await post('/api/categories', { name: 'Phones', parentId: parent.body.id }).expect(201);
      await post('/api/categories', { name: 'Cameras', parentId: parent.body.id }).expect(201);

      const children = await request(app.getHttpServer()).get(`/api/categories/${parent.body.id}/children`).expect(200);
      const bySlug = await request(app.getHttpServer()).get('/api/categories/slug/phones').expect(200);

      expect(children.body.map((child: { name: string }) => child.name)).toEqual(['Cameras', 'Phones']);
      expect(bySlug.body.parentId).toBe(parent.body.id);
    });

    it('pages categories ordered by name', async () => {
      for (const name of ['Toys', 'Books', 'Garden']) {
        await post('/api/categories', { name }).expect(201);
      }

      const res = await request(app.getHttpServer()).get('/api/categories?limit=2&offset=1').expect(200);

      expect(res.body.items.map((category: { name: string }) => category.name)).toEqual(['Garden', 'Toys']);
      expect(res.body).toMatchObject({ total: 3, limit: 2, offset: 1 });
    });

    it('refuses to make a category its own parent', async () => {
      const category = await post('/api/categories', { name: 'Loop' }).expect(201);

      const res = await request(app.getHttpServer())
        .put(`/api/categories/${category.body.id}`)
        .send({ parentId: category.body.id })
        .expect(422);

      expect(res.body.detail).toBe('A category cannot be its own parent');
    });

    it('refuses to move a category under its own descendant', async () => {
      const root = await post('/api/categories', { name: 'Root' }).expect(201);
      const child = await post('/api/categories', { name: 'Child', parentId: root.body.id }).expect(201);

      const res = await request(app.getHttpServer())
        .put(`/api/categories/${root.body.id}`)
        .send({ parentId: child.body.id })
        .expect(422);

      expect(res.body.detail).toBe(`Category ${child.body.id} is a descendant of ${root.body.id} and cannot be its parent`);
    });

    it('turns children into roots and unlinks products when a category is deleted', async () => {
      const parent = await post('/api/categories', { name: 'Outdoor' }).expect(201);
      const child = await post('/api/categories', { name: 'Tents', parentId: parent.body.id }).expect(201);
      const product = await post('/api/products', {
        name: 'Tent',
        price: 120,
        sku: 'TENT-1',
        categoryIds: [parent.body.id, child.body.id],
      }).expect(201);

      await request(app.getHttpServer()).delete(`/api/categories/${parent.body.id}`).expect(204);

      const orphan = await request(app.getHttpServer()).get(`/api/categories/${child.body.id}`).expect(200);
      const reread = await request(app.getHttpServer()).get(`/api/products/${product.body.id}`).expect(200);
      expect(orphan.body.parentId).toBeNull();
      expect(reread.body.categories.map((category: { id: string }) => category.id)).toEqual([child.body.id]);
      await request(app.getHttpServer()).delete(`/api/categories/${parent.body.id}`).expect(404);
    });

    it('answers 404 listing products of a category that does not exist', async () => {
      const missing = '33333333-3333-4333-8333-333333333333';
      const res = await request(app.getHttpServer()).get(`/api/products/category/${missing}`).expect(404);

      expect(res.body.detail).toBe(`Category with ID ${missing} not found`);
    });
  });

  describe('brands', () => {
    it('creates a brand and finds it by name', async () => {
      const created = await post('/api/brands', { name: 'Acme', logo: 'https://img.test/acme.png' }).expect(201);

      const res = await request(app.getHttpServer()).get('/api/brands/name/Acme').expect(200);

      expect(res.body).toMatchObject({ id: created.body.id, name: 'Acme', logo: 'https://img.test/acme.png', description: null });
    });

    it('rejects a second brand with the same name', async () => {
      await post('/api/brands', { name: 'Acme' }).expect(201);
      const res = await post('/api/brands', { name: 'Acme' }).expect(409);

      expect(res.body).toEqual({ statusCode: 409, detail: 'A brand with name "Acme" already exists' });
    });

    it('answers 404 for an unknown brand name', async () => {
      const res = await request(app.getHttpServer()).get('/api/brands/name/Nobody').expect(404);

      expect(res.body.detail).toBe('Brand with name Nobody not found');
    });

    it('embeds the brand in products and clears it when the brand is deleted', async () => {
      const brand = await post('/api/brands', { name: 'Acme' }).expect(201);
      const product = await post('/api/products', { name: 'Anvil', price: 70, sku: 'ANV-1', brandId: brand.body.id }).expect(201);
      expect(product.body.brand).toEqual({ id: brand.body.id, name: 'Acme', logo: null });

      await request(app.getHttpServer()).delete(`/api/brands/${brand.body.id}`).expect(204);

      const reread = await request(app.getHttpServer()).get(`/api/products/${product.body.id}`).expect(200);
      expect(reread.body.brand).toBeNull();
      expect(catalog.products.get(product.body.id)?.brandId).toBeNull();
    });

    it('answers 404 creating a product for a brand that does not exist', async () => {
      const missing = '44444444-4444-4444-8444-444444444444';
      const res = await post('/api/products', { name: 'Anvil', price: 70, sku: 'ANV-1', brandId: missing }).expect(404);

      expect(res.body.detail).toBe(`Brand with ID ${missing} not found`);
    });

    it('rejects a brand name that is only whitespace', async () => {
      const res = await post('/api/brands', { name: '   ' }).expect(422);

      expect(res.body).toEqual({ statusCode: 422, detail: 'Brand name cannot be empty' });
      expect(catalog.brands.size).toBe(0);
    });

    it('renames a brand', async () => {
      const brand = await post('/api/brands', { name: 'Acme' }).expect(201);

      const res = await request(app.getHttpServer())
        .put(`/api/brands/${brand.body.id}`)
        .send({ name: 'Acme Corp' })
        .expect(200);

      expect(res.body.name).toBe('Acme Corp');
    });
  });

  describe('dummy', () => {
    it('creates records with sequential ids and reads them back', async () => {
      const first = await post('/api/dummy', { name: 'alpha' }).expect(201);
      await post('/api/dummy', { name: 'beta' }).expect(201);

      const byId = await request(app.getHttpServer()).get(`/api/dummy/${first.body.id}`).expect(200);
      const byName = await request(app.getHttpServer()).get('/api/dummy/search?name=beta').expect(200);
      const all = await request(app.getHttpServer()).get('/api/dummy').expect(200);

      expect(byId.body).toEqual({ id: 1, name: 'alpha' });
      expect(byName.body).toEqual([{ id: 2, name: 'beta' }]);
      expect(all.body).toEqual({ items: [{ id: 1, name: 'alpha' }, { id: 2, name: 'beta' }], total: 2, limit: 10, offset: 0 });
    });

    it('finds every record sharing a name and an empty list for none', async () => {
      await post('/api/dummy', { name: 'twin' }).expect(201);
      await post('/api/dummy', { name: 'twin' }).expect(201);

      const twins = await request(app.getHttpServer()).get('/api/dummy/search?name=twin').expect(200);
      const none = await request(app.getHttpServer()).get('/api/dummy/search?name=nobody').expect(200);

      expect(twins.body).toEqual([{ id: 1, name: 'twin' }, { id: 2, name: 'twin' }]);
      expect(none.body).toEqual([]);
    });

    it('rejects a blank name', async () => {
      const res = await post('/api/dummy', { name: '   ' }).expect(422);

      expect(res.body.detail).toBe('Dummy name cannot be empty');
    });

    it('answers 404 for an unknown id and 422 for a non-numeric one', async () => {
      const missing = await request(app.getHttpServer()).get('/api/dummy/99').expect(404);
      await request(app.getHttpServer()).get('/api/dummy/abc').expect(422);

      expect(missing.body.detail).toBe('Dummy with ID 99 not found');
    });
  });
});

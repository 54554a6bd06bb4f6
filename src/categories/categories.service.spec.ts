import { createCatalogServices, CatalogServices } from '../../test/support/catalog-services';
import { CategoryNotFoundError, DuplicateValueError, InvalidEntityError } from '../common/errors/catalog.errors';
import { CategoriesService } from './categories.service';

describe('CategoriesService', () => {
  let services: CatalogServices;
  let service: CategoriesService;

  beforeEach(() => {
    services = createCatalogServices();
    service = services.categories;
  });

  it('suffixes a derived slug that is taken', async () => {
    await service.create({ name: 'Phones' });

    const second = await service.create({ name: 'phones' });

    expect(second.slug).toBe('phones-1');
  });

  it('rejects a name that is only whitespace', async () => {
    await expect(service.create({ name: '  ' })).rejects.toThrow(new InvalidEntityError('Category name cannot be empty'));

    const category = await service.create({ name: 'Phones' });
    await expect(service.update(category.id, { name: '\t' })).rejects.toThrow(
      new InvalidEntityError('Category name cannot be empty'),
    );
    expect((await service.findOne(category.id)).name).toBe('Phones');
  });

  it('rejects an explicit slug that is taken', async () => {
    await service.create({ name: 'Phones' });

    await expect(service.create({ name: 'Mobiles', slug: 'phones' })).rejects.toThrow(
      new DuplicateValueError('category', 'slug', 'phones'),
    );
  });

  it('reports the first id that does not exist', async () => {
    const known = await service.create({ name: 'Known' });

    await expect(service.assertAllExist([known.id, 'missing-a', 'missing-b'])).rejects.toThrow(
      new CategoryNotFoundError('missing-a'),
    );
    await expect(service.assertAllExist([known.id])).resolves.toBeUndefined();
  });

  it('refuses a grandchild as the new parent', async () => {
    const root = await service.create({ name: 'Root' });
    const child = await service.create({ name: 'Child', parentId: root.id });
    const grandchild = await service.create({ name: 'Grandchild', parentId: child.id });

    await expect(service.update(root.id, { parentId: grandchild.id })).rejects.toThrow(
      new InvalidEntityError(`Category ${grandchild.id} is a descendant of ${root.id} and cannot be its parent`),
    );
  });

  it('moves a category under a sibling and back to the root', async () => {
    const a = await service.create({ name: 'A' });
    const b = await service.create({ name: 'B' });

    const moved = await service.update(b.id, { parentId: a.id });
    const rooted = await service.update(b.id, { parentId: null });

    expect(moved.parentId).toBe(a.id);
    expect(rooted.parentId).toBeNull();
  });

  it('publishes updates with the previous state', async () => {
    const category = await service.create({ name: 'Old Name' });

    await service.update(category.id, { name: 'New Name' });

    const event = services.emitted[1];
    expect(event.eventType).toBe('category.updated');
    expect(event.data.name).toBe('New Name');
    expect(event.previousData?.name).toBe('Old Name');
  });

  it('returns false when deleting a category that does not exist', async () => {
    await expect(service.remove('missing-id')).resolves.toBe(false);
    expect(services.emitted).toEqual([]);
  });

  it('throws for children of an unknown category', async () => {
    await expect(service.findChildren('missing-id')).rejects.toThrow(new CategoryNotFoundError('missing-id'));
  });
});

import { createCatalogServices, CatalogServices } from '../../test/support/catalog-services';
import { DummyNotFoundError, InvalidEntityError } from '../common/errors/catalog.errors';
import { DummyService } from './dummy.service';

describe('DummyService', () => {
  let services: CatalogServices;
  let service: DummyService;

  beforeEach(() => {
    services = createCatalogServices();
    service = services.dummy;
  });

  it('stores the trimmed name and publishes dummy.created', async () => {
    const dummy = await service.create('  first ');

    expect(dummy).toEqual({ id: 1, name: 'first' });
    expect(services.emitted[0]).toMatchObject({ eventType: 'dummy.created', aggregateId: '1', data: { id: 1, name: 'first' } });
  });

  it('rejects an empty name', async () => {
    await expect(service.create('')).rejects.toThrow(new InvalidEntityError('Dummy name cannot be empty'));
  });

  it('throws DummyNotFoundError for an unknown id', async () => {
    await expect(service.findOne(7)).rejects.toThrow(new DummyNotFoundError(7));
  });

  it('returns every dummy sharing a name, in id order', async () => {
    await service.create('twin');
    await service.create('solo');
    await service.create('twin');

    await expect(service.findByName('twin')).resolves.toEqual([{ id: 1, name: 'twin' }, { id: 3, name: 'twin' }]);
    await expect(service.findByName('ghost')).resolves.toEqual([]);
  });
});

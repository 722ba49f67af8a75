import { NotFoundError, ServiceError } from '../../common/errors/panel.errors';
import { TestHarness, createHarness, fakePanel, seedPanel } from '../../testing/test-harness';
import { LocationsService } from './locations.service';

describe('LocationsService', () => {
  let h: TestHarness;
  let service: LocationsService;

  beforeEach(() => {
    h = createHarness();
    service = new LocationsService(h.locations);
  });

  afterEach(() => h.close());

  it('creates a trimmed location and refuses duplicates regardless of case', () => {
    const de = service.createLocation({ name: ' Germany ', flag: '🇩🇪' });

    expect(de).toMatchObject({ name: 'Germany', flag: '🇩🇪' });
    expect(() => service.createLocation({ name: 'germany' })).toThrow(ServiceError);
  });

  it('lists locations with panel counts', () => {
    const de = service.createLocation({ name: 'DE' });
    service.createLocation({ name: 'NL' });
    seedPanel(h, de, fakePanel(h, 'a.test'));
    seedPanel(h, de, fakePanel(h, 'b.test'), { isActive: false });

    expect(service.listLocations()).toEqual([
      expect.objectContaining({ name: 'DE', panelsCount: 2, activePanelsCount: 1 }),
      expect.objectContaining({ name: 'NL', panelsCount: 0, activePanelsCount: 0 }),
    ]);
  });

  it('refuses to delete a location with active panels', () => {
    const de = service.createLocation({ name: 'DE' });
    seedPanel(h, de, fakePanel(h, 'a.test'));

    expect(() => service.deleteLocation(de.id)).toThrow(ServiceError);
    expect(h.locations.findById(de.id)).not.toBeNull();
  });

  it('refuses to delete a location still referenced by inactive panels', () => {
    const de = service.createLocation({ name: 'DE' });
    seedPanel(h, de, fakePanel(h, 'a.test'), { isActive: false });

    expect(() => service.deleteLocation(de.id)).toThrow(
      new ServiceError('Location DE is still referenced by 1 inactive panel(s)'),
    );
    expect(h.locations.findById(de.id)).not.toBeNull();
  });

  it('deletes an unused location', () => {
    const de = service.createLocation({ name: 'DE' });

    expect(service.deleteLocation(de.id).name).toBe('DE');
    expect(h.locations.findById(de.id)).toBeNull();
    expect(() => service.deleteLocation(de.id)).toThrow(NotFoundError);
  });
});

import { InMemoryLicenseStore } from './in-memory-license.store';
import { StorageUnavailableError } from '../../common/errors/storage.errors';
import { DAY_MS, buildLicense } from '../testing/license.fixtures';

describe('InMemoryLicenseStore', () => {
  const now = new Date('2026-05-01T00:00:00.000Z');
  const active = buildLicense({ license_key: 'MEM-000000-AAAA-AAAA-AAAA-0001' });
  const expired = buildLicense({
    license_key: 'MEM-000000-AAAA-AAAA-AAAA-0002',
    expiration_date: new Date(now.getTime() - DAY_MS),
  });
  let store: InMemoryLicenseStore;

  beforeEach(() => {
    store = new InMemoryLicenseStore([active, expired]);
  });

  it('reports fallback mode', () => {
    expect(store.mode).toBe('fallback');
  });

  it('looks licenses up by exact key', async () => {
    await expect(store.findByKey(active.license_key)).resolves.toEqual({ id: 1, ...active });
    await expect(store.findByKey(active.license_key.toLowerCase())).resolves.toBeNull();
  });

  it('refuses writes to the catalog', async () => {
    await expect(store.insert(buildLicense())).rejects.toBeInstanceOf(StorageUnavailableError);
    await expect(store.setActive(active.license_key, false)).rejects.toBeInstanceOf(
      StorageUnavailableError,
    );
  });

  it('never remembers activations', async () => {
    await store.withLicenseLock(1, (scope) =>
      scope.addActivation({
        license_id: 1,
        hardware_fingerprint: 'HW-A',
        machine_name: '',
        first_activated: now,
        last_seen: now,
        product_version: '',
      }),
    );

    await expect(store.listActivations(1)).resolves.toEqual([]);
  });

  it('counts active licenses that have not expired', async () => {
    await expect(store.countLicenses(now)).resolves.toEqual({ total: 2, active: 1 });
  });

  it('accepts audit entries without storing them', async () => {
    await expect(
      store.appendLog({
        license_id: null,
        license_key: 'NOPE',
        hardware_fingerprint: 'HW-A',
        validation_date: now,
        is_successful: false,
        error_message: 'License key not found',
        ip_address: '127.0.0.1',
      }),
    ).resolves.toBeUndefined();
    await expect(store.ping()).resolves.toBe(true);
  });
});

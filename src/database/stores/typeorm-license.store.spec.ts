import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { DatabaseModule } from '../database.module';
import { LICENSE_STORE, LicenseStore, NewActivation } from './license-store.interface';
import { isUniqueViolation } from './typeorm-license.store';
import { ValidationLogEntry } from '../entities/validation-log-entry.entity';
import { DuplicateKeyError } from '../../common/errors/storage.errors';
import {
  DAY_MS,
  SQLITE_IN_MEMORY,
  buildLicense,
  testConfigModule,
} from '../testing/license.fixtures';

describe('TypeOrmLicenseStore', () => {
  let moduleRef: TestingModule;
  let store: LicenseStore;

  beforeEach(async () => {
    moduleRef = await Test.createTestingModule({
      imports: [testConfigModule(), DatabaseModule.forRoot({ connection: SQLITE_IN_MEMORY })],
    }).compile();
    store = moduleRef.get<LicenseStore>(LICENSE_STORE);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  function activation(licenseId: number, fingerprint: string, at: Date): NewActivation {
    return {
      license_id: licenseId,
      hardware_fingerprint: fingerprint,
      machine_name: `${fingerprint}-PC`,
      first_activated: at,
      last_seen: at,
      product_version: '1.0.0',
    };
  }

  it('reports durable mode', () => {
    expect(store.mode).toBe('durable');
  });

  it('round-trips a license', async () => {
    const license = buildLicense({ customer_email: 'ada@example.com', max_activations: 3 });
    const saved = await store.insert(license);

    const found = await store.findByKey(license.license_key);

    expect(found).toEqual({ ...license, id: saved.id });
  });

  it('rejects a duplicate key with DuplicateKeyError', async () => {
    const license = buildLicense();
    await store.insert(license);

    const error = await store
      .insert({ ...license, customer_name: 'Someone Else' })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(DuplicateKeyError);
    expect(error).toMatchObject({ licenseKey: license.license_key });
  });

  it('returns the committed row when the same insert is repeated', async () => {
    const license = buildLicense();
    const first = await store.insert(license);

    const repeated = await store.insert({ ...license });

    expect(repeated.id).toBe(first.id);
    await expect(store.countLicenses(new Date())).resolves.toEqual({ total: 1, active: 1 });
  });

  it('toggles the active flag and reports unknown keys', async () => {
    const license = buildLicense();
    await store.insert(license);

    const updated = await store.setActive(license.license_key, false);

    expect(updated?.is_active).toBe(false);
    await expect(store.findByKey(license.license_key)).resolves.toMatchObject({
      is_active: false,
    });
    await expect(store.setActive('UNKNOWN-KEY', false)).resolves.toBeNull();
  });

  it('lists activations oldest first and applies updates', async () => {
    const { id } = await store.insert(buildLicense({ max_activations: 3 }));
    const start = new Date('2026-01-01T00:00:00.000Z');

    await store.withLicenseLock(id, async (scope) => {
      await scope.addActivation(activation(id, 'HW-B', new Date(start.getTime() + 1000)));
      await scope.addActivation(activation(id, 'HW-A', start));
    });

    const [first, second] = await store.listActivations(id);
    expect([first?.hardware_fingerprint, second?.hardware_fingerprint]).toEqual(['HW-A', 'HW-B']);

    const seen = new Date(start.getTime() + DAY_MS);
    if (!first) {
      throw new Error('expected an activation');
    }
    await store.updateActivation({ ...first, last_seen: seen, machine_name: 'RENAMED' });

    const [renewed] = await store.listActivations(id);
    expect(renewed).toMatchObject({
      hardware_fingerprint: 'HW-A',
      machine_name: 'RENAMED',
      last_seen: seen,
      first_activated: start,
    });
  });

  it('rolls back activation writes when the locked work fails', async () => {
    const { id } = await store.insert(buildLicense());

    await expect(
      store.withLicenseLock(id, async (scope) => {
        await scope.addActivation(activation(id, 'HW-A', new Date()));
        throw new Error('decision failed');
      }),
    ).rejects.toThrow('decision failed');

    await expect(store.listActivations(id)).resolves.toEqual([]);
  });

  it('serializes concurrent work on the same license', async () => {
    const { id } = await store.insert(buildLicense({ max_activations: 2 }));

    const attempts = ['HW-1', 'HW-2', 'HW-3', 'HW-4'].map((fingerprint) =>
      store.withLicenseLock(id, async (scope) => {
        const bound = await scope.listActivations(id);
        if (bound.length >= 2) {
          return false;
        }
        await scope.addActivation(activation(id, fingerprint, new Date()));
        return true;
      }),
    );

    const outcomes = await Promise.all(attempts);

    expect(outcomes.filter(Boolean)).toHaveLength(2);
    await expect(store.listActivations(id)).resolves.toHaveLength(2);
  });

  it('appends audit entries', async () => {
    const repository = moduleRef.get<Repository<ValidationLogEntry>>(
      getRepositoryToken(ValidationLogEntry),
    );

    await store.appendLog({
      license_id: null,
      license_key: 'NOPE',
      hardware_fingerprint: 'HW-A',
      validation_date: new Date('2026-02-03T04:05:06.000Z'),
      is_successful: false,
      error_message: 'License key not found',
      ip_address: '10.0.0.7',
    });

    const entries = await repository.find();
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      license_id: null,
      license_key: 'NOPE',
      is_successful: false,
      error_message: 'License key not found',
      ip_address: '10.0.0.7',
      validation_date: new Date('2026-02-03T04:05:06.000Z'),
    });
  });

  it('counts total and currently active licenses', async () => {
    const now = new Date();
    await store.insert(buildLicense());
    await store.insert(buildLicense({ is_active: false }));
    await store.insert(buildLicense({ expiration_date: new Date(now.getTime() - DAY_MS) }));

    await expect(store.countLicenses(now)).resolves.toEqual({ total: 3, active: 1 });
  });

  it('answers a ping while connected', async () => {
    await expect(store.ping()).resolves.toBe(true);
  });
});

describe('isUniqueViolation', () => {
  it('recognises PostgreSQL and SQLite unique violations', () => {
    expect(isUniqueViolation(Object.assign(new Error('duplicate key'), { code: '23505' }))).toBe(
      true,
    );
    expect(
      isUniqueViolation(
        Object.assign(new Error('SQLITE_CONSTRAINT: UNIQUE constraint failed: licenses.license_key'), {
          code: 'SQLITE_CONSTRAINT',
        }),
      ),
    ).toBe(true);
  });

  it('ignores other constraint failures', () => {
    expect(
      isUniqueViolation(
        Object.assign(new Error('SQLITE_CONSTRAINT: NOT NULL constraint failed'), {
          code: 'SQLITE_CONSTRAINT',
        }),
      ),
    ).toBe(false);
    expect(isUniqueViolation(new Error('no code'))).toBe(false);
  });
});

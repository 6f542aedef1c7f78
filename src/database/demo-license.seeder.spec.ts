import { Test, TestingModule } from '@nestjs/testing';
import { DatabaseModule } from './database.module';
import { DemoLicenseSeeder } from './demo-license.seeder';
import { LICENSE_STORE, LicenseStore } from './stores/license-store.interface';
import { DEMO_LICENSE_SEEDS } from './seeds/demo-licenses';
import {
  DAY_MS,
  SQLITE_IN_MEMORY,
  buildLicense,
  testConfigModule,
} from './testing/license.fixtures';

describe('DemoLicenseSeeder', () => {
  let moduleRef: TestingModule;

  async function compile(values: Record<string, string> = {}) {
    moduleRef = await Test.createTestingModule({
      imports: [testConfigModule(values), DatabaseModule.forRoot({ connection: SQLITE_IN_MEMORY })],
    }).compile();
    return moduleRef.get<LicenseStore>(LICENSE_STORE);
  }

  afterEach(async () => {
    await moduleRef.close();
  });

  it('fills an empty table with the demo catalog', async () => {
    const store = await compile();
    const now = new Date('2026-01-01T00:00:00.000Z');

    await expect(moduleRef.get(DemoLicenseSeeder).seed(now)).resolves.toBe(
      DEMO_LICENSE_SEEDS.length,
    );

    const demo = await store.findByKey('LAS-DEMO01-STND-TEST-0000-0001');
    expect(demo).toMatchObject({
      customer_name: 'Demo User 1',
      max_activations: 1,
      is_active: true,
      expiration_date: new Date(now.getTime() + 365 * DAY_MS),
    });
  });

  it('leaves a populated table alone', async () => {
    const store = await compile();
    await store.insert(buildLicense());

    await expect(moduleRef.get(DemoLicenseSeeder).seed(new Date())).resolves.toBe(0);
    await expect(store.findByKey('LAS-DEMO01-STND-TEST-0000-0001')).resolves.toBeNull();
  });

  it('seeds on bootstrap when enabled', async () => {
    const store = await compile({ SEED_DEMO_LICENSES: 'true' });

    await moduleRef.init();

    await expect(store.countLicenses(new Date())).resolves.toEqual({ total: 2, active: 2 });
  });

  it('skips seeding on bootstrap when disabled', async () => {
    const store = await compile();

    await moduleRef.init();

    await expect(store.countLicenses(new Date())).resolves.toEqual({ total: 0, active: 0 });
  });
});

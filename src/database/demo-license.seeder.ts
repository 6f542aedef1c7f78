import { Inject, Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LICENSE_STORE, LicenseStore } from './stores/license-store.interface';
import { buildDemoLicenses } from './seeds/demo-licenses';
import { readFlag } from '../config/env';

@Injectable()
export class DemoLicenseSeeder implements OnApplicationBootstrap {
  private readonly logger = new Logger(DemoLicenseSeeder.name);

  constructor(
    @Inject(LICENSE_STORE) private readonly store: LicenseStore,
    private readonly configService: ConfigService,
  ) {}

  async onApplicationBootstrap() {
    if (!readFlag(this.configService, 'SEED_DEMO_LICENSES', true)) {
      return;
    }
    await this.seed(new Date());
  }

  /**
   * Inserts the demo catalog into an empty license table.
   * Returns the number of licenses written.
   */
  async seed(now: Date): Promise<number> {
    const { total } = await this.store.countLicenses(now);
    if (total > 0) {
      this.logger.log(`📊 Found ${total} existing licenses, skipping demo seed`);
      return 0;
    }

    this.logger.log('🌱 Seeding database with demo licenses...');
    const licenses = buildDemoLicenses(now);
    for (const license of licenses) {
      await this.store.insert(license);
    }
    this.logger.log(`✅ Database seeded with ${licenses.length} demo licenses`);
    return licenses.length;
  }
}

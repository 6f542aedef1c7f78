import {
  ConflictException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';
import {
  LICENSE_STORE,
  LicenseCounts,
  LicenseRecord,
  LicenseStore,
} from '../../database/stores/license-store.interface';
import {
  DuplicateKeyError,
  StorageUnavailableError,
} from '../../common/errors/storage.errors';
import { LicenseKeyGenerator } from './license-key.generator';
import { GenerateLicenseDto } from './dto/generate-license.dto';
import { GenerateBulkLicensesDto } from './dto/generate-bulk-licenses.dto';
import {
  BulkGenerationResult,
  FailedLicense,
  GeneratedLicense,
  LicenseHealth,
} from './interfaces/license-results.interface';

export const SERVICE_VERSION = '1.0.0';

/** Attempts per license before a key collision is reported (one retry). */
export const KEY_GENERATION_ATTEMPTS = 2;

const DAY_MS = 24 * 60 * 60 * 1000;

const STORAGE_DOWN_MESSAGE = 'Storage not reachable - license not created';

interface LicenseDraft {
  customerName: string;
  customerEmail: string | null;
  validityDays: number;
  maxActivations: number;
}

@Injectable()
export class LicensesService {
  private readonly logger = new Logger(LicensesService.name);

  constructor(
    @Inject(LICENSE_STORE) private readonly store: LicenseStore,
    private readonly keyGenerator: LicenseKeyGenerator,
  ) {}

  async generate(dto: GenerateLicenseDto): Promise<GeneratedLicense> {
    this.assertDurable('License generation');
    this.logger.log(
      `📝 License generation request - Customer: '${dto.customerName}', Days: ${dto.validityDays}`,
    );

    try {
      return await this.createLicense({
        customerName: dto.customerName,
        customerEmail: dto.customerEmail || null,
        validityDays: dto.validityDays,
        maxActivations: dto.maxActivations,
      });
    } catch (error) {
      if (error instanceof StorageUnavailableError) {
        this.logger.error(`❌ License generation failed: ${error.message}`);
        throw new ServiceUnavailableException(
          'License generation unavailable - database not connected',
        );
      }
      throw error;
    }
  }

  /**
   * Creates `count` licenses named "<prefix> <n>". Each one persists on its
   * own; the result lists every entry in request order with its outcome.
   * Storage going away stops the run: with nothing created yet the whole
   * request is unavailable, otherwise the untried entries are marked failed.
   */
  async generateBulk(dto: GenerateBulkLicensesDto): Promise<BulkGenerationResult> {
    this.assertDurable('Bulk license generation');
    this.logger.log(
      `📝 Bulk generation request - Prefix: '${dto.customerNamePrefix}', Count: ${dto.count}, Days: ${dto.validityDays}`,
    );

    const licenses: Array<GeneratedLicense | FailedLicense> = [];
    let storageDown = false;
    for (let n = 1; n <= dto.count; n++) {
      const customerName = `${dto.customerNamePrefix} ${n}`;
      if (storageDown) {
        licenses.push({ success: false, customerName, message: STORAGE_DOWN_MESSAGE });
        continue;
      }

      try {
        licenses.push(
          await this.createLicense({
            customerName,
            customerEmail: null,
            validityDays: dto.validityDays,
            maxActivations: dto.maxActivations,
          }),
        );
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(`❌ Bulk generation failed for '${customerName}': ${message}`);
        if (error instanceof StorageUnavailableError) {
          if (!licenses.some((license) => license.success)) {
            throw new ServiceUnavailableException(
              'Bulk license generation unavailable - database not connected',
            );
          }
          storageDown = true;
          licenses.push({ success: false, customerName, message: STORAGE_DOWN_MESSAGE });
          continue;
        }
        licenses.push({ success: false, customerName, message });
      }
    }

    const created = licenses.filter((license) => license.success).length;
    const failed = licenses.length - created;
    return {
      success: failed === 0,
      message:
        failed === 0
          ? `Generated ${created} license(s)`
          : `Generated ${created} of ${dto.count} license(s); ${failed} failed`,
      requested: dto.count,
      created,
      failed,
      licenses,
    };
  }

  async deactivate(licenseKey: string): Promise<LicenseRecord> {
    this.assertDurable('License deactivation');

    let license: LicenseRecord | null;
    try {
      license = await this.store.setActive(licenseKey, false);
    } catch (error) {
      if (error instanceof StorageUnavailableError) {
        throw new ServiceUnavailableException(
          'License deactivation unavailable - database not connected',
        );
      }
      throw error;
    }

    if (!license) {
      throw new NotFoundException('License key not found');
    }
    this.logger.log(`🔒 License ${licenseKey.substring(0, 5)}... deactivated`);
    return license;
  }

  async getHealth(): Promise<LicenseHealth> {
    let storageReachable = await this.store.ping();
    let counts: LicenseCounts | null = null;

    if (storageReachable) {
      try {
        counts = await this.store.countLicenses(new Date());
      } catch (error) {
        this.logger.error(
          `❌ Health check failed: ${error instanceof Error ? error.message : String(error)}`,
        );
        storageReachable = false;
      }
    }

    return {
      status: storageReachable ? 'Healthy' : 'Degraded',
      mode: this.store.mode,
      storageReachable,
      totalLicenses: counts ? counts.total : null,
      activeLicenses: counts ? counts.active : null,
      serverTime: new Date(),
      version: SERVICE_VERSION,
    };
  }

  private assertDurable(operation: string): void {
    if (this.store.mode === 'fallback') {
      this.logger.error(`❌ ${operation} refused: running in in-memory mode`);
      throw new ServiceUnavailableException(
        `${operation} unavailable - database not connected`,
      );
    }
  }

  private async createLicense(draft: LicenseDraft): Promise<GeneratedLicense> {
    const creationDate = new Date();
    const expirationDate = new Date(creationDate.getTime() + draft.validityDays * DAY_MS);

    for (let attempt = 1; attempt <= KEY_GENERATION_ATTEMPTS; attempt++) {
      const licenseKey = this.keyGenerator.generate(creationDate);
      try {
        const saved = await this.store.insert({
          license_key: licenseKey,
          customer_name: draft.customerName,
          customer_email: draft.customerEmail,
          max_activations: draft.maxActivations,
          creation_date: creationDate,
          expiration_date: expirationDate,
          is_active: true,
        });

        this.logger.log(
          `✅ Generated license ${saved.license_key.substring(0, 5)}... for '${saved.customer_name}' (valid for ${draft.validityDays} days)`,
        );
        return {
          success: true,
          licenseKey: saved.license_key,
          customerName: saved.customer_name,
          customerEmail: saved.customer_email,
          creationDate: saved.creation_date,
          expirationDate: saved.expiration_date,
          validityDays: draft.validityDays,
          maxActivations: saved.max_activations,
          message: 'License generated successfully',
        };
      } catch (error) {
        if (!(error instanceof DuplicateKeyError)) {
          throw error;
        }
        this.logger.warn(
          `⚠️ Duplicate license key generated (attempt ${attempt}/${KEY_GENERATION_ATTEMPTS}), regenerating...`,
        );
      }
    }

    throw new ConflictException('Failed to generate unique license key. Please try again.');
  }
}

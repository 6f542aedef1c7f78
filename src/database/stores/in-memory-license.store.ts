import { Logger } from '@nestjs/common';
import {
  ActivationRecord,
  ActivationScope,
  LicenseCounts,
  LicenseRecord,
  LicenseStore,
  NewActivation,
  NewLicense,
  NewValidationLogEntry,
} from './license-store.interface';
import { StorageUnavailableError } from '../../common/errors/storage.errors';

/**
 * Read-only fallback used when no database is configured. It answers lookups
 * from a catalog fixed at startup and keeps no activations, so every bound
 * count it reports is zero. Audit entries go to the process log only.
 */
export class InMemoryLicenseStore implements LicenseStore {
  readonly mode = 'fallback' as const;

  private readonly logger = new Logger(InMemoryLicenseStore.name);
  private readonly licenses: ReadonlyMap<string, LicenseRecord>;

  constructor(catalog: NewLicense[]) {
    this.licenses = new Map(
      catalog.map((license, index) => [license.license_key, { id: index + 1, ...license }]),
    );
  }

  async findByKey(licenseKey: string): Promise<LicenseRecord | null> {
    const license = this.licenses.get(licenseKey);
    return license ? { ...license } : null;
  }

  async insert(license: NewLicense): Promise<LicenseRecord> {
    throw new StorageUnavailableError(
      `Cannot persist license "${license.license_key.substring(0, 5)}..." without a database`,
    );
  }

  async setActive(licenseKey: string, _isActive: boolean): Promise<LicenseRecord | null> {
    throw new StorageUnavailableError(
      `Cannot update license "${licenseKey.substring(0, 5)}..." without a database`,
    );
  }

  async listActivations(_licenseId: number): Promise<ActivationRecord[]> {
    return [];
  }

  async addActivation(activation: NewActivation): Promise<ActivationRecord> {
    return { id: 0, ...activation };
  }

  async updateActivation(activation: ActivationRecord): Promise<ActivationRecord> {
    return activation;
  }

  async appendLog(entry: NewValidationLogEntry): Promise<void> {
    this.logger.log(
      `📝 Validation ${entry.is_successful ? 'succeeded' : 'failed'} for ${entry.license_key.substring(0, 5)}... ` +
        `from ${entry.ip_address || 'unknown'}${entry.error_message ? `: ${entry.error_message}` : ''}`,
    );
  }

  withLicenseLock<T>(
    _licenseId: number,
    work: (scope: ActivationScope) => Promise<T>,
  ): Promise<T> {
    return work(this);
  }

  async countLicenses(now: Date): Promise<LicenseCounts> {
    const licenses = [...this.licenses.values()];
    return {
      total: licenses.length,
      active: licenses.filter((license) => license.is_active && license.expiration_date > now)
        .length,
    };
  }

  async ping(): Promise<boolean> {
    return true;
  }
}

import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, MoreThan, Repository } from 'typeorm';
import { License } from '../entities/license.entity';
import { Activation } from '../entities/activation.entity';
import { ValidationLogEntry } from '../entities/validation-log-entry.entity';
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
import { DuplicateKeyError } from '../../common/errors/storage.errors';
import { StoragePolicy, storageErrorCode } from '../../common/storage/storage-policy';
import { KeyedMutex } from '../../common/utils/keyed-mutex';

export function isUniqueViolation(error: unknown): boolean {
  const code = storageErrorCode(error);
  if (code === '23505' || code === 'SQLITE_CONSTRAINT_UNIQUE') {
    return true;
  }
  return (
    code === 'SQLITE_CONSTRAINT' &&
    error instanceof Error &&
    error.message.includes('UNIQUE')
  );
}

function isSameLicense(stored: LicenseRecord, candidate: NewLicense): boolean {
  return (
    stored.customer_name === candidate.customer_name &&
    stored.customer_email === candidate.customer_email &&
    stored.max_activations === candidate.max_activations &&
    stored.creation_date.getTime() === candidate.creation_date.getTime() &&
    stored.expiration_date.getTime() === candidate.expiration_date.getTime()
  );
}

class EntityManagerActivationScope implements ActivationScope {
  constructor(private readonly manager: EntityManager) {}

  listActivations(licenseId: number): Promise<ActivationRecord[]> {
    return this.manager.find(Activation, {
      where: { license_id: licenseId },
      order: { first_activated: 'ASC', id: 'ASC' },
    });
  }

  addActivation(activation: NewActivation): Promise<ActivationRecord> {
    return this.manager.save(this.manager.create(Activation, activation));
  }

  async updateActivation(activation: ActivationRecord): Promise<ActivationRecord> {
    await this.manager.update(
      Activation,
      { id: activation.id },
      {
        machine_name: activation.machine_name,
        last_seen: activation.last_seen,
        product_version: activation.product_version,
      },
    );
    return activation;
  }
}

/**
 * Durable store on TypeORM (PostgreSQL or SQLite).
 *
 * Writes that must not interleave go through a keyed mutex: per license on
 * PostgreSQL, where the transaction also takes a row lock on the license, and
 * one key for the whole database on SQLite, which has a single writer and a
 * single shared query runner.
 */
@Injectable()
export class TypeOrmLicenseStore implements LicenseStore {
  readonly mode = 'durable' as const;

  private readonly logger = new Logger(TypeOrmLicenseStore.name);
  private readonly mutex = new KeyedMutex();

  constructor(
    @InjectRepository(License)
    private licenseRepository: Repository<License>,
    @InjectRepository(ValidationLogEntry)
    private validationLogRepository: Repository<ValidationLogEntry>,
    private dataSource: DataSource,
    private policy: StoragePolicy,
  ) {}

  private get supportsRowLocks(): boolean {
    return this.dataSource.options.type === 'postgres';
  }

  private serialize<T>(licenseId: number | null, work: () => Promise<T>): Promise<T> {
    if (!this.supportsRowLocks) {
      return this.mutex.runExclusive('database', work);
    }
    if (licenseId === null) {
      return work();
    }
    return this.mutex.runExclusive(`license:${licenseId}`, work);
  }

  findByKey(licenseKey: string): Promise<LicenseRecord | null> {
    return this.policy.run('findByKey', () =>
      this.licenseRepository.findOne({ where: { license_key: licenseKey } }),
    );
  }

  insert(license: NewLicense): Promise<LicenseRecord> {
    return this.policy.run('insert', () =>
      this.serialize(null, async () => {
        try {
          return await this.licenseRepository.save(this.licenseRepository.create(license));
        } catch (error) {
          if (!isUniqueViolation(error)) {
            throw error;
          }
          // A retry after a timed-out attempt that did commit finds its own row
          const existing = await this.licenseRepository.findOne({
            where: { license_key: license.license_key },
          });
          if (existing && isSameLicense(existing, license)) {
            return existing;
          }
          throw new DuplicateKeyError(license.license_key);
        }
      }),
    );
  }

  setActive(licenseKey: string, isActive: boolean): Promise<LicenseRecord | null> {
    return this.policy.run('setActive', () =>
      this.serialize(null, async () => {
        const license = await this.licenseRepository.findOne({
          where: { license_key: licenseKey },
        });
        if (!license) {
          return null;
        }
        await this.licenseRepository.update({ id: license.id }, { is_active: isActive });
        license.is_active = isActive;
        return license;
      }),
    );
  }

  listActivations(licenseId: number): Promise<ActivationRecord[]> {
    return this.policy.run('listActivations', () =>
      new EntityManagerActivationScope(this.dataSource.manager).listActivations(licenseId),
    );
  }

  addActivation(activation: NewActivation): Promise<ActivationRecord> {
    return this.policy.run('addActivation', () =>
      this.serialize(activation.license_id, () =>
        new EntityManagerActivationScope(this.dataSource.manager).addActivation(activation),
      ),
    );
  }

  updateActivation(activation: ActivationRecord): Promise<ActivationRecord> {
    return this.policy.run('updateActivation', () =>
      this.serialize(activation.license_id, () =>
        new EntityManagerActivationScope(this.dataSource.manager).updateActivation(activation),
      ),
    );
  }

  appendLog(entry: NewValidationLogEntry): Promise<void> {
    return this.policy.run('appendLog', () =>
      this.serialize(null, async () => {
        await this.validationLogRepository.insert(entry);
      }),
    );
  }

  withLicenseLock<T>(
    licenseId: number,
    work: (scope: ActivationScope) => Promise<T>,
  ): Promise<T> {
    // The mutex sits inside the policy so a timed-out attempt keeps its slot
    // until its transaction has actually settled.
    return this.policy.run('withLicenseLock', () =>
      this.serialize(licenseId, () =>
        this.dataSource.transaction(async (manager) => {
          if (this.supportsRowLocks) {
            await manager.findOne(License, {
              where: { id: licenseId },
              lock: { mode: 'pessimistic_write' },
            });
          }
          return work(new EntityManagerActivationScope(manager));
        }),
      ),
    );
  }

  countLicenses(now: Date): Promise<LicenseCounts> {
    return this.policy.run('countLicenses', async () => {
      const total = await this.licenseRepository.count();
      const active = await this.licenseRepository.count({
        where: { is_active: true, expiration_date: MoreThan(now) },
      });
      return { total, active };
    });
  }

  async ping(): Promise<boolean> {
    if (!this.dataSource.isInitialized) {
      return false;
    }
    try {
      await this.policy.run('ping', () => this.dataSource.query('SELECT 1'));
      return true;
    } catch (error) {
      this.logger.warn(
        `❌ Storage ping failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }
}

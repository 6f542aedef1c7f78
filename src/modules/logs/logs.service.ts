import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import {
  LICENSE_STORE,
  LicenseStore,
  NewValidationLogEntry,
} from '../../database/stores/license-store.interface';

export interface CreateValidationLogDto {
  license_id: number | null;
  license_key: string;
  hardware_fingerprint: string;
  is_successful: boolean;
  error_message?: string;
  ip_address?: string;
}

@Injectable()
export class LogsService implements OnModuleDestroy {
  private readonly logger = new Logger(LogsService.name);
  private readonly pending = new Set<Promise<void>>();

  constructor(@Inject(LICENSE_STORE) private readonly store: LicenseStore) {}

  /**
   * Append a validation attempt to the audit trail.
   * Never rejects: a failed write is reported to the process log and dropped,
   * so it cannot change the verdict of the request that produced it. Callers
   * need not wait for it.
   */
  recordValidation(dto: CreateValidationLogDto): Promise<void> {
    const entry: NewValidationLogEntry = {
      license_id: dto.license_id,
      license_key: dto.license_key.substring(0, 200),
      hardware_fingerprint: dto.hardware_fingerprint.substring(0, 100),
      validation_date: new Date(),
      is_successful: dto.is_successful,
      error_message: (dto.error_message || '').substring(0, 500),
      ip_address: (dto.ip_address || '').substring(0, 50),
    };

    const write = this.append(entry).finally(() => {
      this.pending.delete(write);
    });
    this.pending.add(write);
    return write;
  }

  /** Resolves once every audit write started so far has settled. */
  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  async onModuleDestroy() {
    await this.flush();
  }

  private async append(entry: NewValidationLogEntry): Promise<void> {
    try {
      await this.store.appendLog(entry);
    } catch (err) {
      this.logger.warn(
        `Error logging license validation for ${entry.license_key.substring(0, 5)}...: ${
          err instanceof Error ? err.message : String(err)
        }`,
      );
    }
  }
}

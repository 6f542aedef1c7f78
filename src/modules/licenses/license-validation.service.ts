import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  LICENSE_STORE,
  LicenseRecord,
  LicenseStore,
} from '../../database/stores/license-store.interface';
import { LogsService } from '../logs/logs.service';
import {
  LicenseRejection,
  ValidationRequest,
  ValidationVerdict,
} from './interfaces/license-results.interface';

type BindingOutcome =
  | { bound: true; renewal: boolean; boundCount: number }
  | { bound: false };

/**
 * Decides whether a license key may run on a given machine and binds the
 * machine to the license when it may.
 *
 * Gates run in a fixed order (existence, active flag, expiry, binding) and the
 * first failing gate names the rejection. Storage failures propagate to the
 * caller; they never turn into a positive verdict.
 */
@Injectable()
export class LicenseValidationService {
  private readonly logger = new Logger(LicenseValidationService.name);

  constructor(
    @Inject(LICENSE_STORE) private readonly store: LicenseStore,
    private readonly logsService: LogsService,
  ) {}

  async validate(request: ValidationRequest): Promise<ValidationVerdict> {
    const now = new Date();
    const license = await this.store.findByKey(request.licenseKey.trim());

    if (!license) {
      return this.reject(request, null, LicenseRejection.UNKNOWN_KEY);
    }

    if (!license.is_active) {
      return this.reject(request, license, LicenseRejection.DEACTIVATED);
    }

    if (now > license.expiration_date) {
      return this.reject(request, license, LicenseRejection.EXPIRED);
    }

    const binding = await this.bind(license, request, now);
    if (!binding.bound) {
      return this.reject(request, license, LicenseRejection.ACTIVATION_LIMIT_REACHED);
    }

    void this.logsService.recordValidation({
      license_id: license.id,
      license_key: request.licenseKey,
      hardware_fingerprint: request.hardwareFingerprint,
      is_successful: true,
      ip_address: request.ipAddress,
    });

    this.logger.log(
      `✅ License ${license.license_key.substring(0, 5)}... ${
        binding.renewal ? 'renewed' : 'activated'
      } for ${license.customer_name} (${binding.boundCount}/${license.max_activations} bound)`,
    );

    return {
      isValid: true,
      customerName: license.customer_name,
      expirationDate: license.expiration_date,
      remainingActivations: Math.max(0, license.max_activations - binding.boundCount),
    };
  }

  /**
   * Count-then-bind, inside the store's per-license critical section.
   * A fingerprint that is already bound always passes, even when the bound
   * count is above the license's current maximum.
   */
  private bind(
    license: LicenseRecord,
    request: ValidationRequest,
    now: Date,
  ): Promise<BindingOutcome> {
    return this.store.withLicenseLock<BindingOutcome>(license.id, async (scope) => {
      const activations = await scope.listActivations(license.id);
      const existing = activations.find(
        (activation) => activation.hardware_fingerprint === request.hardwareFingerprint,
      );

      if (existing) {
        await scope.updateActivation({
          ...existing,
          last_seen: now,
          machine_name: request.machineName ?? existing.machine_name,
          product_version: request.productVersion ?? existing.product_version,
        });
      } else {
        if (activations.length >= license.max_activations) {
          return { bound: false };
        }
        await scope.addActivation({
          license_id: license.id,
          hardware_fingerprint: request.hardwareFingerprint,
          machine_name: request.machineName ?? '',
          first_activated: now,
          last_seen: now,
          product_version: request.productVersion ?? '',
        });
      }

      // Re-read rather than compute: the fallback store keeps nothing, and
      // reports the full capacity as remaining.
      const boundCount = (await scope.listActivations(license.id)).length;
      return { bound: true, renewal: existing !== undefined, boundCount };
    });
  }

  private reject(
    request: ValidationRequest,
    license: LicenseRecord | null,
    reason: LicenseRejection,
  ): ValidationVerdict {
    this.logger.warn(
      `❌ License validation failed for ${request.licenseKey.substring(0, 5)}...: ${reason}`,
    );

    void this.logsService.recordValidation({
      license_id: license ? license.id : null,
      license_key: request.licenseKey,
      hardware_fingerprint: request.hardwareFingerprint,
      is_successful: false,
      error_message: reason,
      ip_address: request.ipAddress,
    });

    return { isValid: false, errorMessage: reason };
  }
}

export const LICENSE_STORE = Symbol('LICENSE_STORE');

export type StorageMode = 'durable' | 'fallback';

export interface LicenseRecord {
  id: number;
  license_key: string;
  customer_name: string;
  customer_email: string | null;
  max_activations: number;
  creation_date: Date;
  expiration_date: Date;
  is_active: boolean;
}

export interface ActivationRecord {
  id: number;
  license_id: number;
  hardware_fingerprint: string;
  machine_name: string;
  first_activated: Date;
  last_seen: Date;
  product_version: string;
}

export interface ValidationLogRecord {
  id: number;
  license_id: number | null;
  license_key: string;
  hardware_fingerprint: string;
  validation_date: Date;
  is_successful: boolean;
  error_message: string;
  ip_address: string;
}

export type NewLicense = Omit<LicenseRecord, 'id'>;
export type NewActivation = Omit<ActivationRecord, 'id'>;
export type NewValidationLogEntry = Omit<ValidationLogRecord, 'id'>;

export interface LicenseCounts {
  total: number;
  /** Active and not yet expired. */
  active: number;
}

/**
 * Activation reads and writes. Inside `withLicenseLock` these run in the same
 * atomic unit as the caller's decision.
 */
export interface ActivationScope {
  /** Ordered by first activation, oldest first. */
  listActivations(licenseId: number): Promise<ActivationRecord[]>;
  addActivation(activation: NewActivation): Promise<ActivationRecord>;
  updateActivation(activation: ActivationRecord): Promise<ActivationRecord>;
}

export interface LicenseStore extends ActivationScope {
  readonly mode: StorageMode;

  findByKey(licenseKey: string): Promise<LicenseRecord | null>;

  /** @throws DuplicateKeyError when the key is already taken */
  insert(license: NewLicense): Promise<LicenseRecord>;

  setActive(licenseKey: string, isActive: boolean): Promise<LicenseRecord | null>;

  appendLog(entry: NewValidationLogEntry): Promise<void>;

  /**
   * Runs `work` as one atomic unit with respect to other work on the same
   * license, so a count-then-insert of activations cannot interleave.
   */
  withLicenseLock<T>(licenseId: number, work: (scope: ActivationScope) => Promise<T>): Promise<T>;

  countLicenses(now: Date): Promise<LicenseCounts>;

  /** True when the backing storage answers right now. */
  ping(): Promise<boolean>;
}

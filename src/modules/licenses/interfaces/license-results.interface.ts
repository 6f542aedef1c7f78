import { StorageMode } from '../../../database/stores/license-store.interface';

export enum LicenseRejection {
  UNKNOWN_KEY = 'License key not found',
  DEACTIVATED = 'License has been deactivated',
  EXPIRED = 'License has expired',
  ACTIVATION_LIMIT_REACHED = 'License is already activated on another machine (activation limit reached)',
}

export interface ValidationRequest {
  licenseKey: string;
  hardwareFingerprint: string;
  machineName?: string;
  productVersion?: string;
  ipAddress?: string;
}

export type ValidationVerdict =
  | {
      isValid: true;
      customerName: string;
      expirationDate: Date;
      remainingActivations: number;
    }
  | {
      isValid: false;
      errorMessage: LicenseRejection;
    };

export interface GeneratedLicense {
  success: true;
  licenseKey: string;
  customerName: string;
  customerEmail: string | null;
  creationDate: Date;
  expirationDate: Date;
  validityDays: number;
  maxActivations: number;
  message: string;
}

export interface FailedLicense {
  success: false;
  customerName: string;
  message: string;
}

export interface BulkGenerationResult {
  success: boolean;
  message: string;
  requested: number;
  created: number;
  failed: number;
  licenses: Array<GeneratedLicense | FailedLicense>;
}

export interface LicenseHealth {
  status: 'Healthy' | 'Degraded';
  mode: StorageMode;
  storageReachable: boolean;
  totalLicenses: number | null;
  activeLicenses: number | null;
  serverTime: Date;
  version: string;
}

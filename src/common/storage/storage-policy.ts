import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { setTimeout as sleep } from 'timers/promises';
import {
  DuplicateKeyError,
  StorageTimeoutError,
  StorageUnavailableError,
} from '../errors/storage.errors';
import { readNonNegativeNumber } from '../../config/env';

export interface StoragePolicyOptions {
  /** Upper bound for a single attempt, in milliseconds. */
  timeoutMs: number;
  /** Extra attempts after the first one fails with a transient error. */
  retries: number;
  /** Linear backoff step between attempts, in milliseconds. */
  backoffMs: number;
}

export const DEFAULT_STORAGE_POLICY: StoragePolicyOptions = {
  timeoutMs: 5000,
  retries: 2,
  backoffMs: 200,
};

// PostgreSQL SQLSTATE values and socket/SQLite codes worth another attempt
const TRANSIENT_CODES = new Set([
  '40001',
  '40P01',
  '53300',
  '57P01',
  '57P03',
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'SQLITE_BUSY',
  'SQLITE_LOCKED',
]);

const TRANSIENT_ERROR_NAMES = new Set([
  'CannotExecuteNotConnectedError',
  'ConnectionIsNotSetError',
]);

function readCode(value: unknown): string | null {
  if (typeof value !== 'object' || value === null || !('code' in value)) {
    return null;
  }
  const { code } = value;
  return typeof code === 'string' ? code : null;
}

/**
 * Extracts the driver error code from a TypeORM QueryFailedError or a raw
 * driver/socket error.
 */
export function storageErrorCode(error: unknown): string | null {
  const direct = readCode(error);
  if (direct) {
    return direct;
  }
  if (typeof error === 'object' && error !== null && 'driverError' in error) {
    return readCode(error.driverError);
  }
  return null;
}

export function isTransientStorageError(error: unknown): boolean {
  if (error instanceof StorageTimeoutError) {
    return true;
  }
  if (error instanceof StorageUnavailableError || error instanceof DuplicateKeyError) {
    return false;
  }
  if (error instanceof Error && TRANSIENT_ERROR_NAMES.has(error.name)) {
    return true;
  }

  const code = storageErrorCode(error);
  if (!code) {
    return false;
  }
  // SQLSTATE class 08 is "connection exception"
  return TRANSIENT_CODES.has(code) || /^08[0-9A-Z]{3}$/.test(code);
}

/**
 * Runs store operations under a timeout and retries transient failures with a
 * linear backoff. Once attempts run out the caller gets StorageUnavailableError;
 * non-transient errors are rethrown untouched on the first occurrence.
 */
export class StoragePolicy {
  private readonly logger = new Logger(StoragePolicy.name);

  constructor(readonly options: StoragePolicyOptions = DEFAULT_STORAGE_POLICY) {}

  static fromConfig(configService: ConfigService): StoragePolicy {
    return new StoragePolicy({
      timeoutMs: readNonNegativeNumber(
        configService,
        'STORAGE_TIMEOUT_MS',
        DEFAULT_STORAGE_POLICY.timeoutMs,
      ),
      retries: Math.floor(
        readNonNegativeNumber(configService, 'STORAGE_RETRIES', DEFAULT_STORAGE_POLICY.retries),
      ),
      backoffMs: readNonNegativeNumber(
        configService,
        'STORAGE_RETRY_BACKOFF_MS',
        DEFAULT_STORAGE_POLICY.backoffMs,
      ),
    });
  }

  async run<T>(operation: string, work: () => Promise<T>): Promise<T> {
    const attempts = this.options.retries + 1;
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      if (attempt > 1 && this.options.backoffMs > 0) {
        await sleep(this.options.backoffMs * (attempt - 1));
      }

      try {
        return await this.withTimeout(operation, work);
      } catch (error) {
        if (!isTransientStorageError(error)) {
          throw error;
        }
        lastError = error;
        this.logger.warn(
          `⚠️ ${operation} failed (attempt ${attempt}/${attempts}): ${
            error instanceof Error ? error.message : String(error)
          }`,
        );
      }
    }

    throw new StorageUnavailableError(
      `Storage operation "${operation}" failed after ${attempts} attempt(s)`,
      { cause: lastError },
    );
  }

  private withTimeout<T>(operation: string, work: () => Promise<T>): Promise<T> {
    const { timeoutMs } = this.options;
    if (timeoutMs === 0) {
      return work();
    }

    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new StorageTimeoutError(operation, timeoutMs));
      }, timeoutMs);
      timer.unref();

      work().then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        },
      );
    });
  }
}

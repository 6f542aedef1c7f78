import { ConfigService } from '@nestjs/config';
import {
  DEFAULT_STORAGE_POLICY,
  StoragePolicy,
  isTransientStorageError,
  storageErrorCode,
} from './storage-policy';
import {
  DuplicateKeyError,
  StorageTimeoutError,
  StorageUnavailableError,
} from '../errors/storage.errors';

function driverError(code: string): Error {
  return Object.assign(new Error(`driver failed with ${code}`), { code });
}

describe('StoragePolicy', () => {
  describe('isTransientStorageError', () => {
    it.each(['08006', '08001', '40001', '40P01', '57P01', 'ECONNREFUSED', 'SQLITE_BUSY'])(
      'treats %s as transient',
      (code) => {
        expect(isTransientStorageError(driverError(code))).toBe(true);
      },
    );

    it.each(['23505', '42P01', 'SQLITE_CONSTRAINT'])('treats %s as permanent', (code) => {
      expect(isTransientStorageError(driverError(code))).toBe(false);
    });

    it('reads the code of a wrapped driver error', () => {
      const wrapped = Object.assign(new Error('query failed'), {
        driverError: driverError('ECONNRESET'),
      });

      expect(storageErrorCode(wrapped)).toBe('ECONNRESET');
      expect(isTransientStorageError(wrapped)).toBe(true);
    });

    it('classifies the store errors themselves', () => {
      expect(isTransientStorageError(new StorageTimeoutError('findByKey', 10))).toBe(true);
      expect(isTransientStorageError(new StorageUnavailableError('down'))).toBe(false);
      expect(isTransientStorageError(new DuplicateKeyError('LAS-260101-AAAA'))).toBe(false);
      expect(isTransientStorageError(new Error('plain'))).toBe(false);
    });

    it('treats a dropped TypeORM connection as transient', () => {
      const error = new Error('Cannot execute operation on "default" connection');
      error.name = 'CannotExecuteNotConnectedError';

      expect(isTransientStorageError(error)).toBe(true);
    });
  });

  describe('run', () => {
    it('returns the first successful result', async () => {
      const policy = new StoragePolicy({ timeoutMs: 0, retries: 2, backoffMs: 0 });
      const work = jest.fn().mockResolvedValue(42);

      await expect(policy.run('count', work)).resolves.toBe(42);
      expect(work).toHaveBeenCalledTimes(1);
    });

    it('retries transient failures', async () => {
      const policy = new StoragePolicy({ timeoutMs: 0, retries: 2, backoffMs: 1 });
      const work = jest
        .fn<Promise<string>, []>()
        .mockRejectedValueOnce(driverError('ECONNRESET'))
        .mockRejectedValueOnce(driverError('40001'))
        .mockResolvedValue('ok');

      await expect(policy.run('findByKey', work)).resolves.toBe('ok');
      expect(work).toHaveBeenCalledTimes(3);
    });

    it('gives up with StorageUnavailableError once attempts run out', async () => {
      const policy = new StoragePolicy({ timeoutMs: 0, retries: 1, backoffMs: 0 });
      const cause = driverError('ECONNREFUSED');
      const work = jest.fn<Promise<string>, []>().mockRejectedValue(cause);

      const error = await policy.run('insert', work).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(StorageUnavailableError);
      expect(error).toMatchObject({
        message: 'Storage operation "insert" failed after 2 attempt(s)',
        cause,
      });
      expect(work).toHaveBeenCalledTimes(2);
    });

    it('rethrows permanent errors without retrying', async () => {
      const policy = new StoragePolicy({ timeoutMs: 0, retries: 3, backoffMs: 0 });
      const duplicate = new DuplicateKeyError('LAS-260101-AAAA');
      const work = jest.fn<Promise<string>, []>().mockRejectedValue(duplicate);

      await expect(policy.run('insert', work)).rejects.toBe(duplicate);
      expect(work).toHaveBeenCalledTimes(1);
    });

    it('times out a stalled attempt', async () => {
      const policy = new StoragePolicy({ timeoutMs: 20, retries: 0, backoffMs: 0 });
      const stalled = () => new Promise<string>(() => undefined);

      const error = await policy.run('ping', stalled).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(StorageUnavailableError);
      expect(error).toMatchObject({
        cause: expect.any(StorageTimeoutError),
      });
    });
  });

  describe('fromConfig', () => {
    it('falls back to the defaults', () => {
      expect(StoragePolicy.fromConfig(new ConfigService({})).options).toEqual(
        DEFAULT_STORAGE_POLICY,
      );
    });

    it('reads numeric settings from config', () => {
      const policy = StoragePolicy.fromConfig(
        new ConfigService({
          STORAGE_TIMEOUT_MS: '1500',
          STORAGE_RETRIES: '3',
          STORAGE_RETRY_BACKOFF_MS: 50,
        }),
      );

      expect(policy.options).toEqual({ timeoutMs: 1500, retries: 3, backoffMs: 50 });
    });

    it('rejects a negative setting', () => {
      expect(() => StoragePolicy.fromConfig(new ConfigService({ STORAGE_RETRIES: '-1' }))).toThrow(
        'STORAGE_RETRIES must be a non-negative number, got "-1"',
      );
    });
  });
});

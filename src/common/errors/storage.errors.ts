/**
 * Raised by a store when an insert collides with an existing license key.
 */
export class DuplicateKeyError extends Error {
  constructor(readonly licenseKey: string) {
    super(`License key "${licenseKey.substring(0, 5)}..." already exists`);
    this.name = 'DuplicateKeyError';
  }
}

/**
 * The durable store could not be reached, timed out on every attempt, or the
 * active store variant cannot perform the operation at all.
 */
export class StorageUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageUnavailableError';
  }
}

export class StorageTimeoutError extends Error {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number,
  ) {
    super(`Storage operation "${operation}" timed out after ${timeoutMs}ms`);
    this.name = 'StorageTimeoutError';
  }
}

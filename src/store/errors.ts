/**
 * Storage error taxonomy.
 */

export type StorageErrorCode = 'STORAGE_UNAVAILABLE' | 'STORAGE_CLOSED';

/**
 * Base class for store failures.
 */
export class StorageError extends Error {
  constructor(
    message: string,
    public readonly code: StorageErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StorageError';
  }
}

/**
 * The database location could not be opened or created.
 */
export class StorageUnavailableError extends StorageError {
  constructor(
    public readonly path: string,
    cause?: unknown
  ) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Storage unavailable at '${path}'${detail}`, 'STORAGE_UNAVAILABLE', { cause });
    this.name = 'StorageUnavailableError';
  }
}

/**
 * An operation was attempted on a store that is not open.
 */
export class StorageClosedError extends StorageError {
  constructor(operation: string) {
    super(`Cannot ${operation}: store is closed`, 'STORAGE_CLOSED');
    this.name = 'StorageClosedError';
  }
}

export function isStorageError(err: unknown): err is StorageError {
  return err instanceof StorageError;
}

import Database from 'better-sqlite3';

/**
 * Raised when the SQLite file cannot be opened, read or written.
 * Never retried here; the caller decides.
 */
export class StorageUnavailableError extends Error {
  readonly operation: string;

  constructor(operation: string, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause ?? 'unknown error');
    super(`Storage unavailable during ${operation}: ${detail}`, { cause });
    this.name = 'StorageUnavailableError';
    this.operation = operation;
  }
}

// Result codes that mean the medium itself is unusable. Extended codes
// (SQLITE_IOERR_WRITE, SQLITE_READONLY_DBMOVED, ...) share these prefixes.
const UNAVAILABLE_CODES = [
  'SQLITE_CANTOPEN',
  'SQLITE_IOERR',
  'SQLITE_BUSY',
  'SQLITE_LOCKED',
  'SQLITE_FULL',
  'SQLITE_READONLY',
  'SQLITE_CORRUPT',
  'SQLITE_NOTADB',
  'SQLITE_PERM',
];

/**
 * Whether a failure means storage is unavailable. Anything that is not a
 * `SqliteError` (filesystem errors, a closed handle) counts; among SQLite
 * errors only the I/O-class codes do, so constraint failures and bad SQL
 * are left alone.
 */
export function isStorageUnavailable(error: unknown): boolean {
  if (error instanceof Database.SqliteError) {
    return UNAVAILABLE_CODES.some((code) => error.code === code || error.code.startsWith(`${code}_`));
  }
  return true;
}

/**
 * Run a storage call. I/O-class failures are rethrown as
 * `StorageUnavailableError`; any other SQLite error propagates unchanged.
 */
export function wrapStorageError<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof StorageUnavailableError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[Database] ${operation} failed:`, message);
    if (!isStorageUnavailable(error)) {
      throw error;
    }
    throw new StorageUnavailableError(operation, error);
  }
}

export { openDatabase, ensureSchema, closeDatabase, type StoreConfig } from './db';
export { ExpenseStore } from './expense-store';
export { StorageUnavailableError, isStorageUnavailable, wrapStorageError } from './errors';

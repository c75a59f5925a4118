import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { EXPENSES_TABLE, IN_MEMORY_DB_PATH } from '../../config/constants';
import { wrapStorageError } from './errors';

export interface StoreConfig {
  dbPath: string;
  busyTimeoutMs?: number;
}

const DEFAULT_BUSY_TIMEOUT_MS = 5000;

export function openDatabase(config: StoreConfig): Database.Database {
  return wrapStorageError('open', () => {
    const inMemory = config.dbPath === IN_MEMORY_DB_PATH;
    const dbPath = inMemory ? config.dbPath : path.resolve(config.dbPath);

    if (!inMemory) {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    const db = new Database(dbPath);
    db.pragma(`busy_timeout = ${config.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS}`);

    // WAL is not available for in-memory databases
    if (!inMemory) {
      db.pragma('journal_mode = WAL');
    }

    return db;
  });
}

/**
 * Create the expenses table and its date index if absent. Existing rows and
 * columns are left untouched, so this can run on every startup.
 */
export function ensureSchema(db: Database.Database): void {
  const statements = [
    `CREATE TABLE IF NOT EXISTS ${EXPENSES_TABLE} (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      date TEXT NOT NULL,
      amount REAL NOT NULL,
      category TEXT NOT NULL,
      subcategory TEXT DEFAULT '',
      note TEXT DEFAULT ''
    )`,

    `CREATE INDEX IF NOT EXISTS idx_expenses_date ON ${EXPENSES_TABLE}(date)`,
  ];

  wrapStorageError('ensureSchema', () => {
    for (const stmt of statements) {
      db.exec(stmt);
    }
  });
}

export function closeDatabase(db: Database.Database): void {
  if (db.open) {
    db.close();
  }
}

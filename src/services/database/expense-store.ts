import Database from 'better-sqlite3';
import { EXPENSES_TABLE } from '../../config/constants';
import type { CategoryTotal, Expense, NewExpense } from '../../types/expense';
import { type StoreConfig, closeDatabase, ensureSchema, openDatabase } from './db';
import { StorageUnavailableError, wrapStorageError } from './errors';

type InsertParams = [date: string, amount: number, category: string, subcategory: string, note: string];

/**
 * Persists expenses and answers date-range queries over them.
 *
 * Date bounds are inclusive and compared as strings, which matches calendar
 * order only for well-formed `YYYY-MM-DD` values.
 */
export class ExpenseStore {
  private db: Database.Database | null = null;

  constructor(private readonly config: StoreConfig) {}

  /** Open the handle and make sure the table exists. Safe to call twice. */
  open(): void {
    if (this.db) return;

    const db = openDatabase(this.config);
    try {
      ensureSchema(db);
    } catch (error) {
      closeDatabase(db);
      throw error;
    }
    this.db = db;
    console.log('[ExpenseStore] Opened', this.config.dbPath);
  }

  close(): void {
    if (!this.db) return;
    closeDatabase(this.db);
    this.db = null;
    console.log('[ExpenseStore] Closed');
  }

  get isOpen(): boolean {
    return this.db !== null;
  }

  create(input: NewExpense): number {
    const db = this.connection('create');
    const params: InsertParams = [
      input.date,
      input.amount,
      input.category,
      input.subcategory ?? '',
      input.note ?? '',
    ];

    return wrapStorageError('create', () => {
      const stmt = db.prepare<InsertParams>(`
        INSERT INTO ${EXPENSES_TABLE} (date, amount, category, subcategory, note)
        VALUES (?, ?, ?, ?, ?)
      `);
      const result = stmt.run(...params);
      return Number(result.lastInsertRowid);
    });
  }

  listByDateRange(startDate: string, endDate: string): Expense[] {
    const db = this.connection('listByDateRange');

    return wrapStorageError('listByDateRange', () => {
      const stmt = db.prepare<[string, string], Expense>(`
        SELECT id, date, amount, category, subcategory, note
        FROM ${EXPENSES_TABLE}
        WHERE date BETWEEN ? AND ?
        ORDER BY id ASC
      `);
      return stmt.all(startDate, endDate);
    });
  }

  /**
   * Sum amounts per category. A `category` of `undefined` or `null` means no
   * filter; any string, including `''`, is matched exactly.
   */
  summarize(startDate: string, endDate: string, category?: string | null): CategoryTotal[] {
    const db = this.connection('summarize');

    let query = `
      SELECT category, SUM(amount) AS total_amount
      FROM ${EXPENSES_TABLE}
      WHERE date BETWEEN ? AND ?
    `;
    const params: string[] = [startDate, endDate];

    if (category !== undefined && category !== null) {
      query += ' AND category = ?';
      params.push(category);
    }

    query += ' GROUP BY category ORDER BY category ASC';

    return wrapStorageError('summarize', () => {
      const stmt = db.prepare<string[], CategoryTotal>(query);
      return stmt.all(...params);
    });
  }

  private connection(operation: string): Database.Database {
    if (!this.db) {
      throw new StorageUnavailableError(operation, new Error('store is not open'));
    }
    return this.db;
  }
}

export const SERVICE_NAME = 'expense-ledger';

export const EXPENSES_TABLE = 'expenses';

export const IN_MEMORY_DB_PATH = ':memory:';

export const CATEGORIES_URI = 'expense://categories';
export const CATEGORIES_MIME_TYPE = 'application/json';

export const TOOL_NAMES = {
  ADD_EXPENSE: 'add_expense',
  LIST_EXPENSES: 'list_expenses',
  SUMMARIZE: 'summarize',
} as const;

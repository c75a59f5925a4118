import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ExpenseStore } from '../src/services/database';
import { callTool, listTools } from '../src/services/tools';

describe('Tools', () => {
  let store: ExpenseStore;

  beforeEach(() => {
    store = new ExpenseStore({ dbPath: ':memory:' });
    store.open();
  });

  afterEach(() => {
    store.close();
  });

  it('should list the three tools', () => {
    expect(listTools().map((t) => t.name)).toEqual(['add_expense', 'list_expenses', 'summarize']);
  });

  it('should add an expense and report its id', () => {
    const result = callTool(store, 'add_expense', { date: '2024-01-01', amount: 10, category: 'food' });
    expect(result).toEqual({ ok: true, result: { status: 'ok', id: 1 } });
  });

  it('should list expenses in range', () => {
    callTool(store, 'add_expense', { date: '2024-01-01', amount: 10, category: 'food', note: 'market' });
    callTool(store, 'add_expense', { date: '2024-02-01', amount: 20, category: 'rent' });

    const result = callTool(store, 'list_expenses', { start_date: '2024-01-01', end_date: '2024-01-31' });
    expect(result).toEqual({
      ok: true,
      result: [{ id: 1, date: '2024-01-01', amount: 10, category: 'food', subcategory: '', note: 'market' }],
    });
  });

  it('should summarize with and without a category', () => {
    callTool(store, 'add_expense', { date: '2024-01-01', amount: 10, category: 'food' });
    callTool(store, 'add_expense', { date: '2024-01-02', amount: 5, category: 'food' });
    callTool(store, 'add_expense', { date: '2024-01-03', amount: 20, category: 'transport' });

    expect(callTool(store, 'summarize', { start_date: '2024-01-01', end_date: '2024-01-03', category: null })).toEqual({
      ok: true,
      result: [
        { category: 'food', total_amount: 15 },
        { category: 'transport', total_amount: 20 },
      ],
    });
    expect(callTool(store, 'summarize', { start_date: '2024-01-01', end_date: '2024-01-03', category: 'transport' })).toEqual({
      ok: true,
      result: [{ category: 'transport', total_amount: 20 }],
    });
  });

  it('should store a numeric string amount as a number', () => {
    callTool(store, 'add_expense', { date: '2024-01-01', amount: '10', category: 'food' });

    expect(store.listByDateRange('2024-01-01', '2024-01-01')[0].amount).toBe(10);
  });

  it('should report invalid arguments', () => {
    const result = callTool(store, 'add_expense', { date: '2024-01-01', category: 'food' });
    expect(result).toEqual({ ok: false, error: { code: 'invalid_arguments', message: 'amount is required' } });
  });

  it('should report an unknown tool', () => {
    const result = callTool(store, 'delete_expense', {});
    expect(result).toEqual({ ok: false, error: { code: 'unknown_tool', message: 'Unknown tool: delete_expense' } });
  });

  it('should report storage failures', () => {
    store.close();
    const result = callTool(store, 'list_expenses', { start_date: '2024-01-01', end_date: '2024-01-31' });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('storage_unavailable');
      expect(result.error.message).toBe('Storage unavailable during listByDateRange: store is not open');
    }
  });
});

import type { z } from 'zod';
import { TOOL_NAMES } from '../../config/constants';
import type { ExpenseStore } from '../database/expense-store';
import { StorageUnavailableError } from '../database/errors';
import type { CategoryTotal, Expense } from '../../types/expense';
import {
  AddExpenseArgsSchema,
  ListExpensesArgsSchema,
  SummarizeArgsSchema,
  validateInput,
  type AddExpenseArgs,
  type ListExpensesArgs,
  type SummarizeArgs,
} from '../validation/schemas';

export type ToolName = (typeof TOOL_NAMES)[keyof typeof TOOL_NAMES];

export type ToolErrorCode = 'unknown_tool' | 'invalid_arguments' | 'storage_unavailable';

export interface AddExpenseResult {
  status: 'ok';
  id: number;
}

export type ToolOutput = AddExpenseResult | Expense[] | CategoryTotal[];

export type ToolResult =
  | { ok: true; result: ToolOutput }
  | { ok: false; error: { code: ToolErrorCode; message: string } };

interface ToolDefinition {
  name: ToolName;
  description: string;
  run: (store: ExpenseStore, args: unknown) => ToolResult;
}

function invalid(message: string): ToolResult {
  return { ok: false, error: { code: 'invalid_arguments', message } };
}

function defineTool<T>(
  name: ToolName,
  description: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  handler: (store: ExpenseStore, args: T) => ToolOutput
): ToolDefinition {
  return {
    name,
    description,
    run: (store, args) => {
      const parsed = validateInput(schema, args);
      if (!parsed.valid) return invalid(parsed.error);
      return { ok: true, result: handler(store, parsed.data) };
    },
  };
}

function addExpense(store: ExpenseStore, args: AddExpenseArgs): AddExpenseResult {
  return { status: 'ok', id: store.create(args) };
}

function listExpenses(store: ExpenseStore, args: ListExpensesArgs): Expense[] {
  return store.listByDateRange(args.start_date, args.end_date);
}

function summarize(store: ExpenseStore, args: SummarizeArgs): CategoryTotal[] {
  return store.summarize(args.start_date, args.end_date, args.category);
}

const TOOLS: ToolDefinition[] = [
  defineTool(TOOL_NAMES.ADD_EXPENSE, 'Add a new expense entry to the database.', AddExpenseArgsSchema, addExpense),
  defineTool(TOOL_NAMES.LIST_EXPENSES, 'List expense entries within an inclusive date range.', ListExpensesArgsSchema, listExpenses),
  defineTool(TOOL_NAMES.SUMMARIZE, 'Summarize expenses by category within an inclusive date range.', SummarizeArgsSchema, summarize),
];

export function listTools(): { name: ToolName; description: string }[] {
  return TOOLS.map(({ name, description }) => ({ name, description }));
}

/**
 * Dispatch a tool call by name. Storage failures come back as
 * `storage_unavailable`; anything else thrown (a constraint failure, say)
 * propagates.
 */
export function callTool(store: ExpenseStore, name: string, args: unknown): ToolResult {
  const tool = TOOLS.find((t) => t.name === name);
  if (!tool) {
    return { ok: false, error: { code: 'unknown_tool', message: `Unknown tool: ${name}` } };
  }

  try {
    return tool.run(store, args);
  } catch (error) {
    if (error instanceof StorageUnavailableError) {
      console.error(`[Tools] ${name} failed:`, error.message);
      return { ok: false, error: { code: 'storage_unavailable', message: error.message } };
    }
    throw error;
  }
}

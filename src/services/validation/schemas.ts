import { z } from 'zod';

/**
 * Tool argument schemas. These check presence and type only; dates, amounts
 * and categories are stored as given.
 */
export const AddExpenseArgsSchema = z.object({
  date: z.string({ required_error: 'date is required' }),
  // Numeric strings such as "10" are accepted; blank strings are not.
  amount: z.preprocess(
    (value) => (typeof value === 'string' && value.trim() !== '' ? Number(value) : value),
    z
      .number({ required_error: 'amount is required', invalid_type_error: 'amount must be a number' })
      .finite('amount must be a finite number')
  ),
  category: z.string({ required_error: 'category is required' }),
  subcategory: z.string().nullish(),
  note: z.string().nullish(),
});

export const ListExpensesArgsSchema = z.object({
  start_date: z.string({ required_error: 'start_date is required' }),
  end_date: z.string({ required_error: 'end_date is required' }),
});

export const SummarizeArgsSchema = ListExpensesArgsSchema.extend({
  category: z.string().nullish(),
});

export type AddExpenseArgs = z.infer<typeof AddExpenseArgsSchema>;
export type ListExpensesArgs = z.infer<typeof ListExpensesArgsSchema>;
export type SummarizeArgs = z.infer<typeof SummarizeArgsSchema>;

/**
 * Validate and parse tool input safely
 */
export function validateInput<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown
): { valid: true; data: T } | { valid: false; error: string } {
  const result = schema.safeParse(input);
  if (result.success) {
    return { valid: true, data: result.data };
  }

  const issue = result.error.errors[0];
  if (!issue) {
    return { valid: false, error: 'Invalid input' };
  }
  const field = issue.path.join('.');
  return { valid: false, error: field && !issue.message.startsWith(field) ? `${field}: ${issue.message}` : issue.message };
}

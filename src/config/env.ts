import { z } from 'zod';
import dotenv from 'dotenv';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  DB_PATH: z.string().min(1).default('./data/expenses.db'),
  DB_BUSY_TIMEOUT_MS: z.string().regex(/^\d+$/, 'Must be a whole number of milliseconds').default('5000').transform(Number),
  CATEGORIES_PATH: z.string().min(1).default('./data/categories.json'),
  HTTP_PORT: z.string().regex(/^\d+$/, 'Must be a port number').default('5000').transform(Number),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse configuration from the given source. Reads `.env` first when the
 * source is the process environment.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  if (source === process.env) {
    dotenv.config();
  }

  return envSchema.parse(source);
}

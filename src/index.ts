import { loadEnv } from './config/env';
import { ExpenseStore } from './services/database';
import { startServer } from './services/http/server';

async function main(): Promise<void> {
  try {
    console.log('Starting expense ledger...');

    const env = loadEnv();

    const store = new ExpenseStore({ dbPath: env.DB_PATH, busyTimeoutMs: env.DB_BUSY_TIMEOUT_MS });
    store.open();
    console.log('Database initialized');

    const server = await startServer({ store, categoriesPath: env.CATEGORIES_PATH }, env.HTTP_PORT);

    const shutdown = (): void => {
      console.log('\nShutting down...');
      server.close();
      store.close();
      process.exit(0);
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  } catch (error) {
    console.error('Fatal error:', error);
    process.exit(1);
  }
}

void main();

import 'dotenv/config';
import { migrate } from 'drizzle-orm/neon-http/migrator';
import { createDatabase } from '../src/infrastructure/db/client.js';
import { loadConfig } from '../src/infrastructure/config.js';
import { logger } from '../src/infrastructure/logger.js';

async function main(): Promise<void> {
  const { databaseUrl } = loadConfig();
  if (!databaseUrl) {
    throw new Error('DATABASE_URL environment variable is not set');
  }

  logger.info('Starting database migration');
  await migrate(createDatabase(databaseUrl), { migrationsFolder: './db/migrations' });
  logger.info('Migrations applied successfully');
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error({ error: message, step: 'migration' }, 'Migration failed');
  process.exit(1);
});

import 'dotenv/config';
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { createDatabase } from '../src/infrastructure/db/client.js';
import { loadConfig } from '../src/infrastructure/config.js';
import { logger } from '../src/infrastructure/logger.js';
import { providerRecordInput } from '../src/domain/schemas.js';
import { upsertProvider } from '../src/services/provider/index.js';

const SEED_FILE = new URL('../data/seed-providers.json', import.meta.url);

async function main(): Promise<void> {
  const { databaseUrl } = loadConfig();
  if (!databaseUrl) {
    throw new Error('DATABASE_URL environment variable is not set');
  }

  const records = z.array(providerRecordInput).parse(JSON.parse(readFileSync(SEED_FILE, 'utf-8')));
  const db = createDatabase(databaseUrl);

  let saved = 0;
  for (const record of records) {
    const result = await upsertProvider(db, record);
    if (!result.ok) throw new Error(`${record.providerId}: ${result.error.message}`);
    saved += 1;
  }

  logger.info({ providers: saved }, 'Seed complete');
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error({ error: message, step: 'seed' }, 'Seed failed');
  process.exit(1);
});

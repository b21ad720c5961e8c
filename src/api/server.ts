import 'dotenv/config';
import { createApp } from './app.js';
import { loadConfig } from '../infrastructure/config.js';
import { createDatabaseWithRetry } from '../infrastructure/db/client.js';
import { logger } from '../infrastructure/logger.js';
import { createSourceClients } from '../services/sources/index.js';
import { ValidationOrchestrator } from '../services/orchestrator/index.js';
import { ValidationRunner } from '../services/job/index.js';

async function main(): Promise<void> {
  const config = loadConfig();
  logger.level = config.logLevel;

  const db = await createDatabaseWithRetry(config.databaseUrl);
  if (!db.ok) {
    throw new Error(`${db.error.message}${db.error.details ? `: ${db.error.details}` : ''}`);
  }

  const orchestrator = new ValidationOrchestrator({
    sources: createSourceClients(config),
    concurrency: config.maxConcurrentValidations,
  });
  const runner = new ValidationRunner({
    db: db.value,
    orchestrator,
    concurrency: config.maxConcurrentValidations,
  });

  const app = createApp({ db: db.value, runner });
  const server = app.listen(config.port, () => {
    logger.info({ port: config.port }, 'Provider Validation API started');
  });

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Shutting down');
    server.close();
    runner
      .shutdown()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Shutdown failed');
        process.exit(1);
      });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Failed to start server');
  process.exit(1);
});

import { neon } from '@neondatabase/serverless';
import { sql } from 'drizzle-orm';
import { drizzle, type NeonHttpDatabase } from 'drizzle-orm/neon-http';
import { logger } from '../logger.js';
import { RetryPolicy } from '../retry.js';
import { createAppError, errorMessage, ErrorCode, type AppError } from '../../domain/errors.js';
import { ok, err, type Result } from '../../domain/result.js';
import * as schema from './schema.js';

export type Database = NeonHttpDatabase<typeof schema>;

const log = logger.child({ module: 'db' });

const CONNECT_POLICY = new RetryPolicy({ maxAttempts: 3, baseDelayMs: 1000, jitterMs: 500 });

export function createDatabase(url: string): Database {
  return drizzle(neon(url), { schema });
}

export async function createDatabaseWithRetry(
  url: string | null,
  policy: RetryPolicy = CONNECT_POLICY,
): Promise<Result<Database, AppError>> {
  if (!url) {
    return err(createAppError(ErrorCode.CONFIG_INVALID, 'DATABASE_URL environment variable is not set', false));
  }

  const connected = await policy.execute(
    async (attempt): Promise<Result<Database, AppError>> => {
      try {
        const db = createDatabase(url);
        await db.execute(sql`SELECT 1`);
        log.info({ attempt }, 'Database connection established');
        return ok(db);
      } catch (cause) {
        log.warn({ attempt, maxAttempts: policy.maxAttempts, error: errorMessage(cause) }, 'Database connection attempt failed');
        return err(createAppError(ErrorCode.DB_CONNECTION_ERROR, 'Database connection failed', true, errorMessage(cause)));
      }
    },
    undefined,
    { module: 'db' },
  );

  if (!connected.ok) {
    log.error({ maxAttempts: policy.maxAttempts, lastError: connected.error.details }, 'Database connection failed after all retries');
    return err(
      createAppError(
        ErrorCode.DB_CONNECTION_ERROR,
        `Failed to connect after ${policy.maxAttempts} attempts`,
        true,
        connected.error.details,
      ),
    );
  }

  return connected;
}

import type { Database } from '../../infrastructure/db/client.js';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, errorMessage, ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';
import type { ProviderRecord, StoredProvider } from '../../domain/types.js';
import { countProviders, findProviderById, findProviders, upsertProviderRow } from './repository.js';

const log = logger.child({ module: 'provider-store' });

export const DEFAULT_PAGE_SIZE = 50;

export interface ProviderPage {
  providers: StoredProvider[];
  total: number;
  limit: number;
  offset: number;
}

function storeError(message: string, cause: unknown, ctx: Record<string, unknown> = {}): AppError {
  const details = errorMessage(cause);
  log.error({ ...ctx, errorCode: ErrorCode.DB_CONNECTION_ERROR, retryable: true, error: details }, message);
  return createAppError(ErrorCode.DB_CONNECTION_ERROR, message, true, details);
}

export async function getProvider(db: Database, providerId: string): Promise<Result<StoredProvider, AppError>> {
  try {
    const provider = await findProviderById(db, providerId);

    if (!provider) {
      log.debug({ providerId }, 'Provider not found');
      return err(createAppError(ErrorCode.PROVIDER_NOT_FOUND, `Provider '${providerId}' not found`, false));
    }

    return ok(provider);
  } catch (error) {
    return err(storeError('Failed to fetch provider', error, { providerId }));
  }
}

export async function upsertProvider(db: Database, record: ProviderRecord): Promise<Result<StoredProvider, AppError>> {
  try {
    const provider = await upsertProviderRow(db, record);
    log.info({ providerId: record.providerId }, 'Provider saved');
    return ok(provider);
  } catch (error) {
    return err(storeError('Failed to save provider', error, { providerId: record.providerId }));
  }
}

export async function listProviders(
  db: Database,
  page: { limit?: number; offset?: number } = {},
): Promise<Result<ProviderPage, AppError>> {
  const limit = page.limit ?? DEFAULT_PAGE_SIZE;
  const offset = page.offset ?? 0;

  try {
    const [providers, total] = await Promise.all([findProviders(db, limit, offset), countProviders(db)]);
    return ok({ providers, total, limit, offset });
  } catch (error) {
    return err(storeError('Failed to list providers', error, { limit, offset }));
  }
}

import type { Database } from '../../infrastructure/db/client.js';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, errorMessage, ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';
import type { Flag } from '../../domain/types.js';
import { findFlagById, findFlags, insertFlags, markFlagResolved, type FlagFilter, type FlagWithResult } from './repository.js';

export { generateFlags } from './rules.js';
export type { FlagOptions } from './rules.js';
export type { FlagFilter, FlagWithResult } from './repository.js';

const log = logger.child({ module: 'flag-store' });

function storeError(message: string, cause: unknown, ctx: Record<string, unknown> = {}): AppError {
  const details = errorMessage(cause);
  log.error({ ...ctx, errorCode: ErrorCode.DB_CONNECTION_ERROR, retryable: true, error: details }, message);
  return createAppError(ErrorCode.DB_CONNECTION_ERROR, message, true, details);
}

export async function saveFlags(
  db: Database,
  flags: readonly Flag[],
  validationResultId: string | null = null,
): Promise<Result<FlagWithResult[], AppError>> {
  try {
    const saved = await insertFlags(db, flags, validationResultId);
    if (saved.length > 0) {
      log.info({ providerId: saved[0].providerId, validationResultId, count: saved.length }, 'Flags saved');
    }
    return ok(saved);
  } catch (error) {
    return err(storeError('Failed to save flags', error, { validationResultId, count: flags.length }));
  }
}

export async function listFlags(db: Database, filter: FlagFilter = {}): Promise<Result<FlagWithResult[], AppError>> {
  try {
    return ok(await findFlags(db, filter));
  } catch (error) {
    return err(storeError('Failed to list flags', error, { ...filter }));
  }
}

/** Marks a flag resolved. Resolving an already resolved flag keeps its original timestamp. */
export async function resolveFlag(
  db: Database,
  flagId: string,
  now: Date = new Date(),
): Promise<Result<FlagWithResult, AppError>> {
  let existing: FlagWithResult | null;
  try {
    existing = await findFlagById(db, flagId);
  } catch (error) {
    return err(storeError('Failed to fetch flag', error, { flagId }));
  }

  if (!existing) {
    return err(createAppError(ErrorCode.FLAG_NOT_FOUND, `Flag '${flagId}' not found`, false));
  }
  if (existing.resolved) {
    log.debug({ flagId }, 'Flag already resolved');
    return ok(existing);
  }

  try {
    const updated = await markFlagResolved(db, flagId, now);
    if (!updated) {
      return err(createAppError(ErrorCode.FLAG_NOT_FOUND, `Flag '${flagId}' not found`, false));
    }
    log.info({ flagId, providerId: updated.providerId }, 'Flag resolved');
    return ok(updated);
  } catch (error) {
    return err(storeError('Failed to resolve flag', error, { flagId }));
  }
}

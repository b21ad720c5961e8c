import type { Database } from '../../infrastructure/db/client.js';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, errorMessage, ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';
import type { Flag, StoredValidationResult, ValidationResult } from '../../domain/types.js';
import { saveFlags } from '../flags/index.js';
import { findFlagsForResults } from '../flags/repository.js';
import {
  findForJob,
  findLatestForProvider,
  insertValidationResult,
  toStoredResult,
  type ValidationResultRow,
} from './repository.js';

const log = logger.child({ module: 'result-store' });

function storeError(message: string, cause: unknown, ctx: Record<string, unknown> = {}): AppError {
  const details = errorMessage(cause);
  log.error({ ...ctx, errorCode: ErrorCode.DB_CONNECTION_ERROR, retryable: true, error: details }, message);
  return createAppError(ErrorCode.DB_CONNECTION_ERROR, message, true, details);
}

function stripResultId({ validationResultId: _ignored, ...flag }: Flag & { validationResultId: string | null }): Flag {
  return flag;
}

/** Appends a result to the provider's history together with its flags. */
export async function saveValidationResult(
  db: Database,
  result: ValidationResult,
): Promise<Result<StoredValidationResult, AppError>> {
  let row: ValidationResultRow;
  try {
    row = await insertValidationResult(db, result);
  } catch (error) {
    return err(storeError('Failed to save validation result', error, { providerId: result.providerId, jobId: result.jobId }));
  }

  const saved = await saveFlags(db, result.flags, row.id);
  if (!saved.ok) return saved;

  log.info(
    { providerId: result.providerId, resultId: row.id, status: result.status, flagCount: result.flags.length },
    'Validation result saved',
  );
  return ok(toStoredResult(row, [...result.flags]));
}

export async function getLatestValidationResult(
  db: Database,
  providerId: string,
): Promise<Result<StoredValidationResult, AppError>> {
  try {
    const row = await findLatestForProvider(db, providerId);
    if (!row) {
      return err(createAppError(ErrorCode.RESULT_NOT_FOUND, `No validation result for provider '${providerId}'`, false));
    }

    const flags = await findFlagsForResults(db, [row.id]);
    return ok(toStoredResult(row, flags.map(stripResultId)));
  } catch (error) {
    return err(storeError('Failed to fetch validation result', error, { providerId }));
  }
}

export async function getJobResults(db: Database, jobId: string): Promise<Result<StoredValidationResult[], AppError>> {
  try {
    const rows = await findForJob(db, jobId);
    const flags = await findFlagsForResults(
      db,
      rows.map((r) => r.id),
    );

    const byResult = new Map<string, Flag[]>();
    for (const flag of flags) {
      if (flag.validationResultId === null) continue;
      const list = byResult.get(flag.validationResultId) ?? [];
      list.push(stripResultId(flag));
      byResult.set(flag.validationResultId, list);
    }

    return ok(rows.map((row) => toStoredResult(row, byResult.get(row.id) ?? [])));
  } catch (error) {
    return err(storeError('Failed to fetch job results', error, { jobId }));
  }
}

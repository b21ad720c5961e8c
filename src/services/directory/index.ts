import type { Database } from '../../infrastructure/db/client.js';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, errorMessage, ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';
import { countUnresolvedByType } from '../flags/repository.js';
import { countProviders } from '../provider/repository.js';

const log = logger.child({ module: 'directory-stats' });

export interface DirectoryStats {
  totalProviders: number;
  unresolvedFlags: number;
  criticalIssues: number;
  warnings: number;
}

export async function getDirectoryStats(db: Database): Promise<Result<DirectoryStats, AppError>> {
  try {
    const [totalProviders, unresolved] = await Promise.all([countProviders(db), countUnresolvedByType(db)]);

    return ok({
      totalProviders,
      unresolvedFlags: unresolved.CRITICAL + unresolved.WARNING + unresolved.INFO,
      criticalIssues: unresolved.CRITICAL,
      warnings: unresolved.WARNING,
    });
  } catch (error) {
    const message = errorMessage(error);
    log.error({ errorCode: ErrorCode.DB_CONNECTION_ERROR, retryable: true, error: message }, 'Failed to compute directory stats');
    return err(createAppError(ErrorCode.DB_CONNECTION_ERROR, 'Failed to compute directory stats', true, message));
  }
}

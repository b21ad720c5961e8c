import type { Database } from '../../infrastructure/db/client.js';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, errorMessage, ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';
import type { ProcessingJob } from '../../domain/types.js';
import {
  findJobById,
  insertJob,
  markJobFinished,
  markJobStarted,
  updateJobCounters,
  type JobCompletion,
  type JobProgress,
} from './repository.js';

export type { JobCompletion, JobProgress } from './repository.js';

const log = logger.child({ module: 'job-tracker' });

function storeError(message: string, cause: unknown, ctx: Record<string, unknown> = {}): AppError {
  const details = errorMessage(cause);
  log.error({ ...ctx, errorCode: ErrorCode.DB_CONNECTION_ERROR, retryable: true, error: details }, message);
  return createAppError(ErrorCode.DB_CONNECTION_ERROR, message, true, details);
}

function jobNotFound(jobId: string): AppError {
  return createAppError(ErrorCode.JOB_NOT_FOUND, `Job '${jobId}' not found`, false);
}

export async function createJob(
  db: Database,
  totalProviders: number,
  filename: string | null = null,
): Promise<Result<ProcessingJob, AppError>> {
  try {
    const job = await insertJob(db, totalProviders, filename);
    log.info({ jobId: job.id, totalProviders, filename }, 'Job created');
    return ok(job);
  } catch (error) {
    return err(storeError('Failed to create job', error, { totalProviders }));
  }
}

export async function getJob(db: Database, jobId: string): Promise<Result<ProcessingJob, AppError>> {
  try {
    const job = await findJobById(db, jobId);
    return job ? ok(job) : err(jobNotFound(jobId));
  } catch (error) {
    return err(storeError('Failed to fetch job', error, { jobId }));
  }
}

export async function startJob(db: Database, jobId: string, now: Date = new Date()): Promise<Result<ProcessingJob, AppError>> {
  try {
    const job = await markJobStarted(db, jobId, now);
    if (!job) return err(jobNotFound(jobId));
    log.info({ jobId }, 'Job processing');
    return ok(job);
  } catch (error) {
    return err(storeError('Failed to start job', error, { jobId }));
  }
}

export async function updateJobProgress(
  db: Database,
  jobId: string,
  progress: JobProgress,
): Promise<Result<ProcessingJob, AppError>> {
  try {
    const job = await updateJobCounters(db, jobId, progress);
    if (!job) return err(jobNotFound(jobId));
    log.debug({ jobId, ...progress }, 'Job progress updated');
    return ok(job);
  } catch (error) {
    return err(storeError('Failed to update job progress', error, { jobId }));
  }
}

export async function finishJob(
  db: Database,
  jobId: string,
  completion: JobCompletion,
): Promise<Result<ProcessingJob, AppError>> {
  try {
    const job = await markJobFinished(db, jobId, completion);
    if (!job) return err(jobNotFound(jobId));
    log.info({ jobId, status: completion.status, errorMessage: completion.errorMessage }, 'Job finished');
    return ok(job);
  } catch (error) {
    return err(storeError('Failed to finish job', error, { jobId }));
  }
}

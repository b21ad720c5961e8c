import type { Database } from '../../infrastructure/db/client.js';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, errorMessage, ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';
import type { ProcessingJob, ProviderRecord, StoredValidationResult, ValidationResult } from '../../domain/types.js';
import { CANCELLED_MESSAGE, type ValidationOrchestrator } from '../orchestrator/index.js';
import { getProvider, upsertProvider } from '../provider/index.js';
import { saveValidationResult } from '../validation-result/index.js';
import { createJob, finishJob, startJob, updateJobProgress, type JobProgress } from './tracker.js';

const log = logger.child({ module: 'job-runner' });

export interface ValidationRunnerDeps {
  db: Database;
  orchestrator: ValidationOrchestrator;
  concurrency: number;
}

export interface StartJobInput {
  providers: ProviderRecord[];
  filename?: string | null;
}

interface ActiveJob {
  controller: AbortController;
  done: Promise<void>;
}

function isCancelled(result: ValidationResult): boolean {
  return result.status === 'ERROR' && result.error === CANCELLED_MESSAGE;
}

/**
 * Runs validation jobs in the background and persists every result as it
 * completes. One AbortController per running job.
 */
export class ValidationRunner {
  private readonly db: Database;
  private readonly orchestrator: ValidationOrchestrator;
  private readonly concurrency: number;
  private readonly activeJobs = new Map<string, ActiveJob>();

  constructor(deps: ValidationRunnerDeps) {
    this.db = deps.db;
    this.orchestrator = deps.orchestrator;
    this.concurrency = deps.concurrency;
  }

  async startValidationJob(input: StartJobInput): Promise<Result<ProcessingJob, AppError>> {
    if (input.providers.length === 0) {
      return err(createAppError(ErrorCode.VALIDATION_ERROR, 'At least one provider is required', false));
    }

    const created = await createJob(this.db, input.providers.length, input.filename ?? null);
    if (!created.ok) return created;

    const job = created.value;
    const controller = new AbortController();
    const done = this.run(job.id, input.providers, controller.signal);
    this.activeJobs.set(job.id, { controller, done });

    return ok(job);
  }

  cancelValidationJob(jobId: string): Result<{ jobId: string }, AppError> {
    const active = this.activeJobs.get(jobId);
    if (!active) {
      return err(createAppError(ErrorCode.JOB_NOT_RUNNING, `Job '${jobId}' is not running`, false));
    }

    active.controller.abort();
    log.info({ jobId }, 'Job cancellation requested');
    return ok({ jobId });
  }

  isRunning(jobId: string): boolean {
    return this.activeJobs.has(jobId);
  }

  /** Resolves once the job has finished; immediately if it is not running. */
  async waitForJob(jobId: string): Promise<void> {
    await this.activeJobs.get(jobId)?.done;
  }

  async shutdown(): Promise<void> {
    const running = [...this.activeJobs.values()];
    for (const job of running) job.controller.abort();
    await Promise.all(running.map((job) => job.done));
  }

  async validateStoredProvider(providerId: string): Promise<Result<StoredValidationResult, AppError>> {
    const provider = await getProvider(this.db, providerId);
    if (!provider.ok) return provider;

    const result = await this.orchestrator.validate(provider.value);
    return saveValidationResult(this.db, result);
  }

  private async run(jobId: string, providers: ProviderRecord[], signal: AbortSignal): Promise<void> {
    const progress: JobProgress = { processedCount: 0, successCount: 0, errorCount: 0 };

    try {
      const started = await startJob(this.db, jobId);
      if (!started.ok) {
        await this.finish(jobId, 'FAILED', started.error.message, progress);
        return;
      }

      await this.orchestrator.validateBatch(providers, {
        signal,
        jobId,
        concurrency: this.concurrency,
        onProgress: async (result, { index }) => {
          if (isCancelled(result)) return;
          await this.persist(jobId, providers[index], result);

          progress.processedCount += 1;
          if (result.status === 'ERROR') progress.errorCount += 1;
          else progress.successCount += 1;

          const updated = await updateJobProgress(this.db, jobId, { ...progress });
          if (!updated.ok) log.warn({ jobId, errorCode: updated.error.code }, 'Job progress not recorded');
        },
      });

      await this.finish(jobId, signal.aborted ? 'CANCELLED' : 'COMPLETED', null, progress);
    } catch (cause) {
      log.error({ jobId, error: errorMessage(cause) }, 'Job run failed');
      await this.finish(jobId, 'FAILED', errorMessage(cause), progress);
    } finally {
      this.activeJobs.delete(jobId);
      log.info({ jobId, ...progress }, 'Job run ended');
    }
  }

  private async persist(jobId: string, record: ProviderRecord, result: ValidationResult): Promise<void> {
    const provider = await upsertProvider(this.db, record);
    if (!provider.ok) {
      log.warn({ jobId, providerId: record.providerId, errorCode: provider.error.code }, 'Provider not stored');
    }

    const saved = await saveValidationResult(this.db, result);
    if (!saved.ok) {
      log.warn({ jobId, providerId: result.providerId, errorCode: saved.error.code }, 'Validation result not stored');
    }
  }

  private async finish(
    jobId: string,
    status: 'COMPLETED' | 'FAILED' | 'CANCELLED',
    errorMessageText: string | null,
    progress: JobProgress,
  ): Promise<void> {
    const finished = await finishJob(this.db, jobId, {
      status,
      completedAt: new Date(),
      errorMessage: errorMessageText,
      progress: { ...progress },
    });
    if (!finished.ok) log.error({ jobId, status, errorCode: finished.error.code }, 'Job completion not recorded');
  }
}

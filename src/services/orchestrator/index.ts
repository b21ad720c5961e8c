import pLimit from 'p-limit';
import { providerRecordInput, type ProviderRecordInput } from '../../domain/schemas.js';
import { errorMessage } from '../../domain/errors.js';
import type { Flag, SourceValidations, ValidationResult, ValidationStatus } from '../../domain/types.js';
import { createValidationLogger, logger } from '../../infrastructure/logger.js';
import { generateFlags } from '../flags/rules.js';
import { computeOverallConfidence, detectAnomalies, generateRecommendations } from '../scoring/index.js';
import type { SourceClients } from '../sources/index.js';

export const VALIDATED_THRESHOLD = 80;
export const PARTIAL_THRESHOLD = 60;
export const DEFAULT_CONCURRENCY = 10;
export const CANCELLED_MESSAGE = 'Validation cancelled';

const log = logger.child({ module: 'orchestrator' });

export interface OrchestratorDeps {
  sources: SourceClients;
  concurrency?: number;
  now?: () => Date;
  newId?: () => string;
}

export interface ValidateOptions {
  signal?: AbortSignal;
  jobId?: string;
}

export interface BatchProgress {
  index: number;
  completed: number;
  total: number;
}

export interface BatchOptions extends ValidateOptions {
  concurrency?: number;
  onProgress?: (result: ValidationResult, progress: BatchProgress) => void | Promise<void>;
}

export function deriveStatus(overallConfidence: number, flags: readonly Flag[]): ValidationStatus {
  if (overallConfidence >= VALIDATED_THRESHOLD && flags.length === 0) return 'VALIDATED';
  if (overallConfidence >= PARTIAL_THRESHOLD) return 'PARTIAL';
  return 'FLAGGED';
}

function emptyValidations(): SourceValidations {
  return { registry: null, address: null, phone: null, web: null };
}

function sourcesUsed(validations: SourceValidations): string[] {
  return [validations.registry, validations.address, validations.phone, validations.web]
    .filter((v): v is NonNullable<typeof v> => v !== null)
    .map((v) => v.source);
}

// A check that throws before returning a promise still settles as rejected.
function settle<T>(check: () => Promise<T>): Promise<T> {
  return Promise.resolve().then(check);
}

function providerIdOf(input: unknown): string {
  if (typeof input === 'object' && input !== null && 'providerId' in input) {
    const id = input.providerId;
    if (typeof id === 'string' || typeof id === 'number') return String(id);
  }
  return 'UNKNOWN';
}

/**
 * Runs the four source checks for a record and turns their outcomes into a
 * scored, flagged result. Faults anywhere in a run surface as an ERROR result
 * for that record only.
 */
export class ValidationOrchestrator {
  private readonly sources: SourceClients;
  private readonly concurrency: number;
  private readonly now: () => Date;
  private readonly newId: (() => string) | undefined;

  constructor(deps: OrchestratorDeps) {
    this.sources = deps.sources;
    this.concurrency = deps.concurrency ?? DEFAULT_CONCURRENCY;
    this.now = deps.now ?? (() => new Date());
    this.newId = deps.newId;
  }

  async validate(input: ProviderRecordInput, options: ValidateOptions = {}): Promise<ValidationResult> {
    const startedAt = this.now();
    const providerId = providerIdOf(input);
    const jobId = options.jobId ?? null;
    const vlog = createValidationLogger(providerId, options.jobId);

    if (options.signal?.aborted) {
      return this.errorResult(providerId, jobId, startedAt, emptyValidations(), CANCELLED_MESSAGE);
    }

    const parsed = providerRecordInput.safeParse(input);
    if (!parsed.success) {
      const message = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      vlog.warn({ details: message }, 'Provider record rejected');
      return this.errorResult(providerId, jobId, startedAt, emptyValidations(), `Invalid provider record: ${message}`);
    }

    const record = parsed.data;
    const signal = options.signal;
    vlog.info('Validation started');

    const [registry, address, phone, web] = await Promise.allSettled([
      settle(() => this.sources.registry.check(record, signal)),
      settle(() => this.sources.address.check(record, signal)),
      settle(() => this.sources.phone.check(record, signal)),
      settle(() => this.sources.web.check(record, signal)),
    ]);

    const validations: SourceValidations = {
      registry: registry.status === 'fulfilled' ? registry.value : null,
      address: address.status === 'fulfilled' ? address.value : null,
      phone: phone.status === 'fulfilled' ? phone.value : null,
      web: web.status === 'fulfilled' ? web.value : null,
    };

    if (signal?.aborted) {
      vlog.info('Validation cancelled while checks were in flight');
      return this.errorResult(providerId, jobId, startedAt, validations, CANCELLED_MESSAGE);
    }

    const fault = [registry, address, phone, web].find((s) => s.status === 'rejected');
    if (fault !== undefined && fault.status === 'rejected') {
      const message = errorMessage(fault.reason);
      vlog.error({ details: message }, 'Source check failed unexpectedly');
      return this.errorResult(providerId, jobId, startedAt, validations, message);
    }

    try {
      const { overallConfidence, adjustments } = computeOverallConfidence(validations);
      const flags = generateFlags(record.providerId, validations, record, { now: startedAt, newId: this.newId });
      const status = deriveStatus(overallConfidence, flags);
      const result: ValidationResult = {
        providerId: record.providerId,
        jobId,
        timestamp: startedAt,
        durationSeconds: this.elapsedSeconds(startedAt),
        validations,
        overallConfidence,
        status,
        flags,
        anomalies: detectAnomalies(validations, overallConfidence),
        recommendations: generateRecommendations(validations, overallConfidence, flags),
        sourcesUsed: sourcesUsed(validations),
        error: null,
      };

      vlog.info(
        { overallConfidence, status, flagCount: flags.length, penalties: adjustments.length, durationSeconds: result.durationSeconds },
        'Validation completed',
      );
      return result;
    } catch (cause) {
      const message = errorMessage(cause);
      vlog.error({ details: message }, 'Scoring failed');
      return this.errorResult(providerId, jobId, startedAt, validations, message);
    }
  }

  /**
   * Validates records with bounded concurrency. Results keep input order;
   * records not yet started when the signal aborts come back cancelled.
   */
  async validateBatch(records: readonly ProviderRecordInput[], options: BatchOptions = {}): Promise<ValidationResult[]> {
    const limit = pLimit(Math.max(1, options.concurrency ?? this.concurrency));
    const total = records.length;
    let completed = 0;

    log.info({ total, jobId: options.jobId }, 'Batch validation started');

    const results = await Promise.all(
      records.map((record, index) =>
        limit(async () => {
          const result = options.signal?.aborted
            ? this.errorResult(providerIdOf(record), options.jobId ?? null, this.now(), emptyValidations(), CANCELLED_MESSAGE)
            : await this.validate(record, { signal: options.signal, jobId: options.jobId });

          completed += 1;
          await this.reportProgress(options, result, { index, completed, total });
          return result;
        }),
      ),
    );

    log.info({ total, jobId: options.jobId }, 'Batch validation finished');
    return results;
  }

  private async reportProgress(options: BatchOptions, result: ValidationResult, progress: BatchProgress): Promise<void> {
    if (!options.onProgress) return;
    try {
      await options.onProgress(result, progress);
    } catch (cause) {
      log.error({ providerId: result.providerId, jobId: options.jobId, details: errorMessage(cause) }, 'Progress callback failed');
    }
  }

  private errorResult(
    providerId: string,
    jobId: string | null,
    startedAt: Date,
    validations: SourceValidations,
    error: string,
  ): ValidationResult {
    return {
      providerId,
      jobId,
      timestamp: startedAt,
      durationSeconds: this.elapsedSeconds(startedAt),
      validations,
      overallConfidence: 0,
      status: 'ERROR',
      flags: [],
      anomalies: [],
      recommendations: [],
      sourcesUsed: sourcesUsed(validations),
      error,
    };
  }

  private elapsedSeconds(startedAt: Date): number {
    return Math.round((this.now().getTime() - startedAt.getTime()) / 10) / 100;
  }
}

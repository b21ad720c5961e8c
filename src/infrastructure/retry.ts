import { setTimeout as delay } from 'node:timers/promises';
import { err, type Result } from '../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../domain/errors.js';
import { logger } from './logger.js';

const log = logger.child({ module: 'retry' });

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  jitterMs?: number;
}

export function cancelledError(): AppError {
  return createAppError(ErrorCode.SOURCE_CANCELLED, 'Operation cancelled', false);
}

/**
 * Bounded retry with linear backoff. Only errors flagged `retryable` are
 * attempted again; everything else is returned on first sight.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly jitterMs: number;

  constructor(options: RetryPolicyOptions) {
    this.maxAttempts = Math.max(1, options.maxAttempts);
    this.baseDelayMs = Math.max(0, options.baseDelayMs);
    this.jitterMs = Math.max(0, options.jitterMs ?? 0);
  }

  delayFor(attempt: number): number {
    return this.baseDelayMs * attempt + Math.random() * this.jitterMs;
  }

  async execute<T>(
    operation: (attempt: number) => Promise<Result<T, AppError>>,
    signal?: AbortSignal,
    context: Record<string, unknown> = {},
  ): Promise<Result<T, AppError>> {
    let lastError: AppError = cancelledError();

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      if (signal?.aborted) return err(cancelledError());

      const result = await operation(attempt);
      if (result.ok || !result.error.retryable) return result;

      lastError = result.error;

      if (attempt < this.maxAttempts) {
        const waitMs = this.delayFor(attempt);
        log.warn(
          { ...context, attempt, maxAttempts: this.maxAttempts, waitMs, errorCode: lastError.code },
          'Transient failure, retrying',
        );
        const completed = await sleep(waitMs, signal);
        if (!completed) return err(cancelledError());
      }
    }

    log.warn({ ...context, maxAttempts: this.maxAttempts, errorCode: lastError.code }, 'Retry attempts exhausted');
    return err(lastError);
  }
}

async function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (ms <= 0) return !signal?.aborted;
  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (cause) {
    log.debug({ reason: cause instanceof Error ? cause.name : String(cause) }, 'Backoff interrupted');
    return false;
  }
}

import { describe, it, expect, vi } from 'vitest';
import { ok, err, type Result } from '../../src/domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../src/domain/errors.js';
import { RetryPolicy } from '../../src/infrastructure/retry.js';

const transient = createAppError(ErrorCode.SOURCE_TIMEOUT, 'timed out', true);
const permanent = createAppError(ErrorCode.SOURCE_NOT_FOUND, 'not found', false);

function operation() {
  return vi.fn<(attempt: number) => Promise<Result<string, AppError>>>();
}

describe('RetryPolicy', () => {
  it('returns the first success without retrying', async () => {
    const op = operation().mockResolvedValue(ok('done'));
    const result = await new RetryPolicy({ maxAttempts: 3, baseDelayMs: 0 }).execute(op);

    expect(result).toEqual({ ok: true, value: 'done' });
    expect(op).toHaveBeenCalledTimes(1);
  });

  it('retries retryable errors until success', async () => {
    const op = operation().mockResolvedValueOnce(err(transient)).mockResolvedValueOnce(ok('second'));
    const result = await new RetryPolicy({ maxAttempts: 3, baseDelayMs: 0 }).execute(op);

    expect(result).toEqual({ ok: true, value: 'second' });
    expect(op).toHaveBeenNthCalledWith(1, 1);
    expect(op).toHaveBeenNthCalledWith(2, 2);
  });

  it('returns the last error once attempts are exhausted', async () => {
    const op = operation().mockResolvedValue(err(transient));
    const result = await new RetryPolicy({ maxAttempts: 3, baseDelayMs: 0 }).execute(op);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBe(transient);
    expect(op).toHaveBeenCalledTimes(3);
  });

  it('never retries a non-retryable error', async () => {
    const op = operation().mockResolvedValue(err(permanent));
    const result = await new RetryPolicy({ maxAttempts: 3, baseDelayMs: 0 }).execute(op);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('SOURCE_NOT_FOUND');
    expect(op).toHaveBeenCalledTimes(1);
  });

  it('does not start when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const op = operation().mockResolvedValue(ok('never'));

    const result = await new RetryPolicy({ maxAttempts: 3, baseDelayMs: 0 }).execute(op, controller.signal);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('SOURCE_CANCELLED');
    expect(op).not.toHaveBeenCalled();
  });

  it('stops waiting when aborted during backoff', async () => {
    const controller = new AbortController();
    const op = operation().mockImplementation(async () => {
      setTimeout(() => controller.abort(), 5);
      return err(transient);
    });

    const result = await new RetryPolicy({ maxAttempts: 3, baseDelayMs: 60_000 }).execute(op, controller.signal);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('SOURCE_CANCELLED');
    expect(op).toHaveBeenCalledTimes(1);
  });

  it('grows the delay linearly with the attempt number', () => {
    const policy = new RetryPolicy({ maxAttempts: 3, baseDelayMs: 2000 });
    expect(policy.delayFor(1)).toBe(2000);
    expect(policy.delayFor(2)).toBe(4000);
  });

  it('treats a non-positive attempt count as one attempt', () => {
    expect(new RetryPolicy({ maxAttempts: 0, baseDelayMs: 0 }).maxAttempts).toBe(1);
  });
});

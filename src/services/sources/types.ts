import type { z } from 'zod';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import type { ProviderRecord, SourceResult } from '../../domain/types.js';
import type { HttpClient } from '../../infrastructure/http.js';
import type { RetryPolicy } from '../../infrastructure/retry.js';

/**
 * One external check against a provider record. Implementations resolve with
 * a result in every case, including transport failures and cancellation.
 */
export interface SourceClient<TData> {
  readonly source: string;
  check(record: ProviderRecord, signal?: AbortSignal): Promise<SourceResult<TData>>;
}

export interface SourceClientDeps {
  http: HttpClient;
  retry: RetryPolicy;
}

export function sourceFailure<TData>(
  source: string,
  confidence: number,
  error: string,
  matchesInput: boolean | null = null,
): SourceResult<TData> {
  return { source, valid: false, confidence, error, verifiedData: null, matchesInput };
}

export function sourceSuccess<TData>(
  source: string,
  confidence: number,
  verifiedData: TData,
  matchesInput: boolean | null = null,
): SourceResult<TData> {
  return { source, valid: true, confidence, error: null, verifiedData, matchesInput };
}

export function requestFailedMessage(error: AppError): string {
  return `API request failed: ${error.message}`;
}

export function parsePayload<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  source: string,
): Result<z.output<S>, AppError> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    return err(createAppError(ErrorCode.SOURCE_MALFORMED_RESPONSE, `${source} returned an unexpected payload`, false, details));
  }
  return ok(parsed.data);
}

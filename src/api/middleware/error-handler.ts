import type { Request, Response, NextFunction } from 'express';
import type { ZodError } from 'zod';
import { ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';

export interface ApiResponse<T> {
  success: boolean;
  data: T | null;
  error: { code: string; message: string; details?: string; retryable?: boolean } | null;
}

export function successResponse<T>(data: T): ApiResponse<T> {
  return { success: true, data, error: null };
}

export function errorResponse(code: string, message: string, details?: string, retryable?: boolean): ApiResponse<null> {
  return { success: false, data: null, error: { code, message, details, retryable } };
}

function isAppError(value: unknown): value is AppError {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    'message' in value &&
    'retryable' in value
  );
}

export function mapErrorCodeToStatus(code: string): number {
  switch (code) {
    case ErrorCode.SOURCE_FORMAT_INVALID:
      return 400;

    case ErrorCode.PROVIDER_NOT_FOUND:
    case ErrorCode.RESULT_NOT_FOUND:
    case ErrorCode.FLAG_NOT_FOUND:
    case ErrorCode.JOB_NOT_FOUND:
      return 404;

    case ErrorCode.JOB_NOT_RUNNING:
      return 409;

    case ErrorCode.VALIDATION_ERROR:
      return 422;

    case ErrorCode.SOURCE_TIMEOUT:
    case ErrorCode.SOURCE_NETWORK_ERROR:
    case ErrorCode.SOURCE_HTTP_ERROR:
    case ErrorCode.SOURCE_AUTH_ERROR:
    case ErrorCode.SOURCE_MALFORMED_RESPONSE:
      return 502;

    case ErrorCode.DB_CONNECTION_ERROR:
    case ErrorCode.CONFIG_INVALID:
      return 503;

    default:
      return 500;
  }
}

export function sendAppError(res: Response, appError: AppError): void {
  const status = mapErrorCodeToStatus(appError.code);
  res.status(status).json(errorResponse(appError.code, appError.message, appError.details, appError.retryable));
}

export function sendValidationError(res: Response, error: ZodError, message = 'Invalid request body'): void {
  const details = error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
  res.status(422).json(errorResponse(ErrorCode.VALIDATION_ERROR, message, details));
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (isAppError(err)) {
    sendAppError(res, err);
    return;
  }

  // express.json() rejects unparseable bodies with a 400 status on the error.
  if ('status' in err && err.status === 400) {
    res.status(400).json(errorResponse('BAD_REQUEST', 'Malformed request body', err.message, false));
    return;
  }

  logger.error({ err: err.message }, 'Unhandled error');
  res.status(500).json(errorResponse('INTERNAL_ERROR', 'An unexpected error occurred', undefined, false));
}

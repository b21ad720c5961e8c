export const ErrorCode = {
  // Source checks
  SOURCE_FORMAT_INVALID: 'SOURCE_FORMAT_INVALID',
  SOURCE_NOT_FOUND: 'SOURCE_NOT_FOUND',
  SOURCE_TIMEOUT: 'SOURCE_TIMEOUT',
  SOURCE_NETWORK_ERROR: 'SOURCE_NETWORK_ERROR',
  SOURCE_HTTP_ERROR: 'SOURCE_HTTP_ERROR',
  SOURCE_AUTH_ERROR: 'SOURCE_AUTH_ERROR',
  SOURCE_MALFORMED_RESPONSE: 'SOURCE_MALFORMED_RESPONSE',
  SOURCE_CANCELLED: 'SOURCE_CANCELLED',

  // Lookups
  PROVIDER_NOT_FOUND: 'PROVIDER_NOT_FOUND',
  RESULT_NOT_FOUND: 'RESULT_NOT_FOUND',
  FLAG_NOT_FOUND: 'FLAG_NOT_FOUND',
  JOB_NOT_FOUND: 'JOB_NOT_FOUND',
  JOB_NOT_RUNNING: 'JOB_NOT_RUNNING',

  // Requests
  VALIDATION_ERROR: 'VALIDATION_ERROR',

  // Infrastructure
  DB_CONNECTION_ERROR: 'DB_CONNECTION_ERROR',
  CONFIG_INVALID: 'CONFIG_INVALID',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppError {
  code: ErrorCode;
  message: string;
  details?: string;
  retryable: boolean;
}

export function createAppError(
  code: ErrorCode,
  message: string,
  retryable: boolean,
  details?: string,
): AppError {
  return { code, message, retryable, details };
}

export function errorMessage(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

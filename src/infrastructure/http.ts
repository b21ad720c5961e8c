import axios, { type AxiosRequestConfig } from 'axios';
import { ok, err, type Result } from '../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../domain/errors.js';
import { logger } from './logger.js';

const log = logger.child({ module: 'http' });

const USER_AGENT = 'Mozilla/5.0 (compatible; ProviderValidation/0.1)';

export interface HttpRequestOptions {
  params?: Record<string, string | number>;
  headers?: Record<string, string>;
  responseType?: 'json' | 'text';
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  data: unknown;
}

export interface HttpClient {
  get(url: string, options?: HttpRequestOptions): Promise<Result<HttpResponse, AppError>>;
}

/** The slice of an axios instance the client relies on. */
export interface AxiosLike {
  get(url: string, config?: AxiosRequestConfig): Promise<{ status: number; data: unknown }>;
}

export class AxiosHttpClient implements HttpClient {
  private readonly client: AxiosLike;
  private readonly timeoutMs: number;

  constructor(client: AxiosLike, timeoutMs: number) {
    this.client = client;
    this.timeoutMs = timeoutMs;
  }

  async get(url: string, options: HttpRequestOptions = {}): Promise<Result<HttpResponse, AppError>> {
    const startTime = Date.now();
    const host = safeHost(url);

    try {
      const response = await this.client.get(url, {
        params: options.params,
        headers: { 'User-Agent': USER_AGENT, ...options.headers },
        responseType: options.responseType ?? 'json',
        timeout: this.timeoutMs,
        signal: options.signal,
      });

      log.debug({ host, status: response.status, latencyMs: Date.now() - startTime }, 'HTTP request succeeded');
      return ok({ status: response.status, data: response.data });
    } catch (cause) {
      return err(this.mapError(cause, host, Date.now() - startTime));
    }
  }

  private mapError(cause: unknown, host: string, latencyMs: number): AppError {
    const details = cause instanceof Error ? cause.message : String(cause);
    const ctx = { host, latencyMs, details };

    if (!axios.isAxiosError(cause)) {
      log.error({ ...ctx, errorCode: ErrorCode.SOURCE_NETWORK_ERROR, retryable: true }, 'HTTP request failed');
      return createAppError(ErrorCode.SOURCE_NETWORK_ERROR, `Request to ${host} failed`, true, details);
    }

    if (cause.code === 'ERR_CANCELED') {
      return createAppError(ErrorCode.SOURCE_CANCELLED, `Request to ${host} was cancelled`, false, details);
    }

    const status = cause.response?.status;

    if (status === 401 || status === 403) {
      log.error({ ...ctx, status, errorCode: ErrorCode.SOURCE_AUTH_ERROR, retryable: false }, 'HTTP authentication failed');
      return createAppError(ErrorCode.SOURCE_AUTH_ERROR, `${host} rejected the credentials (${status})`, false, details);
    }

    if (status !== undefined) {
      log.warn({ ...ctx, status, errorCode: ErrorCode.SOURCE_HTTP_ERROR, retryable: true }, 'HTTP non-success status');
      return createAppError(ErrorCode.SOURCE_HTTP_ERROR, `${host} returned ${status}`, true, details);
    }

    if (cause.code === 'ECONNABORTED' || cause.code === 'ETIMEDOUT') {
      log.warn({ ...ctx, errorCode: ErrorCode.SOURCE_TIMEOUT, retryable: true }, 'HTTP request timed out');
      return createAppError(ErrorCode.SOURCE_TIMEOUT, `Request to ${host} timed out`, true, details);
    }

    log.warn({ ...ctx, code: cause.code, errorCode: ErrorCode.SOURCE_NETWORK_ERROR, retryable: true }, 'HTTP connection failed');
    return createAppError(ErrorCode.SOURCE_NETWORK_ERROR, `Could not reach ${host}`, true, details);
  }
}

function safeHost(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return url;
  }
}

export function createHttpClient(timeoutMs: number): HttpClient {
  return new AxiosHttpClient(axios.create({ maxRedirects: 5 }), timeoutMs);
}

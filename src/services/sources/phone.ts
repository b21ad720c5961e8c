import { z } from 'zod';
import type { PhoneData, PhoneResult, ProviderRecord } from '../../domain/types.js';
import { logger } from '../../infrastructure/logger.js';
import { digitsOnly } from '../comparison/index.js';
import {
  parsePayload,
  requestFailedMessage,
  sourceFailure,
  sourceSuccess,
  type SourceClient,
  type SourceClientDeps,
} from './types.js';

export const PHONE_SOURCE = 'NumVerify API';

const NUMVERIFY_URL = 'http://apilayer.net/api/validate';

export const PhoneConfidence = {
  REJECTED: 40,
  REQUEST_FAILED: 50,
  BASE: 70,
  CARRIER_CONFIRMED: 85,
  LIKELY_DISCONNECTED: 20,
} as const;

const log = logger.child({ module: 'source-phone' });

const numVerifyResponse = z.object({
  success: z.boolean().optional(),
  error: z.object({ info: z.string().default('') }).optional(),
  valid: z.boolean().default(false),
  line_type: z.string().nullable().default('unknown'),
  carrier: z.string().nullable().default(''),
  country_name: z.string().nullable().default(''),
  country_code: z.string().nullable().default(''),
  local_format: z.string().nullable().default(''),
  international_format: z.string().nullable().default(''),
});

/**
 * Reduces a phone to its ten-digit national form. Returns null when fewer
 * than ten digits remain.
 */
export function normalizePhone(phone: string): string | null {
  const digits = digitsOnly(phone);
  if (digits.length < 10) return null;
  return digits.length === 11 && digits.startsWith('1') ? digits.slice(1) : digits;
}

export function scorePhone(lineType: string, carrier: string): number {
  let confidence: number = PhoneConfidence.BASE;
  if (carrier) confidence = PhoneConfidence.CARRIER_CONFIRMED;

  if (lineType === 'mobile' || lineType === 'landline') {
    confidence = Math.max(confidence, PhoneConfidence.CARRIER_CONFIRMED);
  } else if (lineType === 'voip') {
    confidence = Math.max(confidence, PhoneConfidence.BASE);
  } else if (lineType === 'unknown') {
    confidence = PhoneConfidence.BASE;
  }

  if (lineType === 'unknown' && !carrier) confidence = PhoneConfidence.LIKELY_DISCONNECTED;
  return confidence;
}

export class PhoneClient implements SourceClient<PhoneData> {
  readonly source = PHONE_SOURCE;
  private readonly deps: SourceClientDeps;
  private readonly apiKey: string;

  constructor(deps: SourceClientDeps, apiKey: string) {
    this.deps = deps;
    this.apiKey = apiKey;
  }

  async check(record: ProviderRecord, signal?: AbortSignal): Promise<PhoneResult> {
    if (!record.phone.trim()) {
      return sourceFailure(this.source, PhoneConfidence.REJECTED, 'No phone number provided');
    }

    const number = normalizePhone(record.phone);
    if (number === null) {
      return sourceFailure(this.source, PhoneConfidence.REJECTED, 'Invalid phone format');
    }

    const response = await this.deps.retry.execute(
      () =>
        this.deps.http.get(NUMVERIFY_URL, {
          params: { access_key: this.apiKey, number, country_code: 'US', format: 1 },
          signal,
        }),
      signal,
      { source: this.source },
    );
    if (!response.ok) {
      log.warn({ providerId: record.providerId, errorCode: response.error.code }, 'Phone lookup failed');
      return sourceFailure(this.source, PhoneConfidence.REQUEST_FAILED, requestFailedMessage(response.error));
    }

    const payload = parsePayload(numVerifyResponse, response.value.data, this.source);
    if (!payload.ok) {
      return sourceFailure(this.source, PhoneConfidence.REQUEST_FAILED, requestFailedMessage(payload.error));
    }

    const body = payload.value;
    // The service reports key and quota problems in a 200 body.
    if (body.success === false) {
      const info = body.error?.info || 'request rejected';
      log.warn({ providerId: record.providerId, info }, 'Phone lookup rejected by service');
      return sourceFailure(this.source, PhoneConfidence.REQUEST_FAILED, `API request failed: ${info}`);
    }
    if (!body.valid) {
      return sourceFailure(this.source, PhoneConfidence.REJECTED, 'Phone number is not valid');
    }

    const lineType = body.line_type || 'unknown';
    const carrier = body.carrier ?? '';
    const data: PhoneData = {
      number,
      country: body.country_name ?? '',
      countryCode: body.country_code ?? '',
      carrier,
      lineType,
      localFormat: body.local_format ?? '',
      internationalFormat: body.international_format ?? '',
    };

    return sourceSuccess(this.source, scorePhone(lineType, carrier), data);
  }
}

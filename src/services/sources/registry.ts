import { z } from 'zod';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import type { InputMismatch, ProviderRecord, RegistryData, RegistryResult } from '../../domain/types.js';
import { logger } from '../../infrastructure/logger.js';
import { digitsOnly, namesMatch, phoneDigitsMatch } from '../comparison/index.js';
import {
  parsePayload,
  requestFailedMessage,
  sourceFailure,
  sourceSuccess,
  type SourceClient,
  type SourceClientDeps,
} from './types.js';

export const REGISTRY_SOURCE = 'NPI Registry (CMS)';
export const MISMATCH_CONFIDENCE_CEILING = 60;

const log = logger.child({ module: 'source-registry' });

const registryAddress = z.object({
  address_1: z.string().default(''),
  city: z.string().default(''),
  state: z.string().default(''),
  postal_code: z.string().default(''),
  country_code: z.string().default(''),
  telephone_number: z.string().default(''),
});

const registryEntry = z.object({
  enumeration_type: z.string().default(''),
  basic: z
    .object({
      first_name: z.string().default(''),
      last_name: z.string().default(''),
      organization_name: z.string().default(''),
      telephone_number: z.string().default(''),
      status: z.string().default(''),
    })
    .default({}),
  taxonomies: z.array(z.object({ desc: z.string().default('') })).default([]),
  addresses: z.array(registryAddress).default([]),
});

const registryResponse = z.object({
  result_count: z.number().default(0),
  results: z.array(registryEntry).default([]),
});

type RegistryEntry = z.output<typeof registryEntry>;

export class RegistryClient implements SourceClient<RegistryData> {
  readonly source = REGISTRY_SOURCE;
  private readonly deps: SourceClientDeps;
  private readonly baseUrl: string;

  constructor(deps: SourceClientDeps, baseUrl: string) {
    this.deps = deps;
    this.baseUrl = baseUrl;
  }

  async check(record: ProviderRecord, signal?: AbortSignal): Promise<RegistryResult> {
    const found = await this.lookup(record.npi, signal);
    if (!found.ok) {
      return sourceFailure(this.source, 0, this.failureMessage(found.error), false);
    }
    return this.compareWithInput(sourceSuccess(this.source, 100, found.value, true), record);
  }

  async lookup(npi: string, signal?: AbortSignal): Promise<Result<RegistryData, AppError>> {
    if (!/^\d{10}$/.test(npi)) {
      return err(createAppError(ErrorCode.SOURCE_FORMAT_INVALID, 'Invalid NPI format', false));
    }

    const ctx = { npi };
    const response = await this.deps.retry.execute(
      () => this.deps.http.get(this.baseUrl, { params: { number: npi, version: '2.1' }, signal }),
      signal,
      { ...ctx, source: this.source },
    );
    if (!response.ok) return response;

    const payload = parsePayload(registryResponse, response.value.data, this.source);
    if (!payload.ok) {
      log.error({ ...ctx, errorCode: payload.error.code, details: payload.error.details }, 'Registry payload rejected');
      return payload;
    }

    const [entry] = payload.value.results;
    if (payload.value.result_count === 0 || entry === undefined) {
      log.info(ctx, 'NPI not present in registry');
      return err(createAppError(ErrorCode.SOURCE_NOT_FOUND, 'NPI not found in registry', false));
    }

    log.debug(ctx, 'Registry entry retrieved');
    return ok(toRegistryData(npi, entry));
  }

  /**
   * Checks the registry entry against the submitted name, city/state and
   * phone. Any disagreement marks the result as not matching and caps its
   * confidence; several disagreements cap it no further.
   */
  compareWithInput(result: RegistryResult, record: ProviderRecord): RegistryResult {
    if (!result.valid || result.verifiedData === null) return result;

    const data = result.verifiedData;
    const mismatched: InputMismatch[] = [];

    const registryName = data.name.trim();
    const inputName = record.fullName.trim();
    if (registryName && inputName && !namesMatch(registryName, inputName)) {
      mismatched.push('name');
    }

    const registryCity = data.address.city.toLowerCase().trim();
    const inputCity = record.city.toLowerCase().trim();
    if (registryCity && inputCity) {
      const sameState = data.address.state.toLowerCase().trim() === record.state.toLowerCase().trim();
      if (registryCity !== inputCity || !sameState) mismatched.push('address');
    }

    if (digitsOnly(data.phone) && digitsOnly(record.phone) && !phoneDigitsMatch(data.phone, record.phone)) {
      mismatched.push('phone');
    }

    if (mismatched.length === 0) {
      return { ...result, matchesInput: true, verifiedData: { ...data, mismatchedFields: [] } };
    }

    log.info({ npi: data.npi, mismatched }, 'Registry entry disagrees with submitted record');
    return {
      ...result,
      matchesInput: false,
      confidence: Math.min(result.confidence, MISMATCH_CONFIDENCE_CEILING),
      verifiedData: { ...data, mismatchedFields: mismatched },
    };
  }

  private failureMessage(error: AppError): string {
    switch (error.code) {
      case ErrorCode.SOURCE_FORMAT_INVALID:
      case ErrorCode.SOURCE_NOT_FOUND:
        return error.message;
      default:
        return requestFailedMessage(error);
    }
  }
}

function toRegistryData(npi: string, entry: RegistryEntry): RegistryData {
  const basic = entry.basic;
  const [address] = entry.addresses;
  const [taxonomy] = entry.taxonomies;
  const personName = `${basic.first_name} ${basic.last_name}`.trim();

  return {
    npi,
    name: personName || basic.organization_name,
    organizationName: basic.organization_name,
    taxonomy: taxonomy?.desc ?? '',
    address: {
      address1: address?.address_1 ?? '',
      city: address?.city ?? '',
      state: address?.state ?? '',
      postalCode: address?.postal_code ?? '',
      countryCode: address?.country_code ?? '',
    },
    phone: basic.telephone_number || (address?.telephone_number ?? ''),
    enumerationType: entry.enumeration_type,
    status: basic.status,
    mismatchedFields: [],
  };
}

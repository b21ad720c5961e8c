import { vi } from 'vitest';
import { ok, err, type Result } from '../../src/domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../src/domain/errors.js';
import type {
  AddressData,
  AddressResult,
  PhoneData,
  PhoneResult,
  ProviderRecord,
  RegistryData,
  RegistryResult,
  SourceValidations,
  WebPresenceData,
  WebPresenceResult,
} from '../../src/domain/types.js';
import type { HttpClient, HttpResponse } from '../../src/infrastructure/http.js';
import { RetryPolicy } from '../../src/infrastructure/retry.js';
import type { SourceClient, SourceClientDeps, SourceClients } from '../../src/services/sources/index.js';

export function providerRecord(overrides: Partial<ProviderRecord> = {}): ProviderRecord {
  return {
    providerId: 'PRV-1',
    npi: '1234567893',
    firstName: 'Jane',
    lastName: 'Doe',
    fullName: 'Jane Doe',
    specialty: 'Family Medicine',
    practiceAddress: '100 Main St',
    city: 'Springfield',
    state: 'IL',
    zipCode: '62701',
    phone: '217-555-0100',
    email: null,
    website: null,
    ...overrides,
  };
}

export function createMockHttp() {
  return { get: vi.fn<HttpClient['get']>() };
}

export function createDeps(http: HttpClient, maxAttempts = 3): SourceClientDeps {
  return { http, retry: new RetryPolicy({ maxAttempts, baseDelayMs: 0 }) };
}

export function httpOk(data: unknown, status = 200): Result<HttpResponse, AppError> {
  return ok({ status, data });
}

export function httpTimeout(): Result<HttpResponse, AppError> {
  return err(createAppError(ErrorCode.SOURCE_TIMEOUT, 'Request to example.test timed out', true));
}

export function registryResult(overrides: Partial<RegistryResult> = {}): RegistryResult {
  return {
    source: 'NPI Registry (CMS)',
    valid: true,
    confidence: 100,
    error: null,
    verifiedData: {
      npi: '1234567893',
      name: 'Jane Doe',
      organizationName: '',
      taxonomy: 'Family Medicine',
      address: { address1: '100 Main St', city: 'SPRINGFIELD', state: 'IL', postalCode: '62701', countryCode: 'US' },
      phone: '217-555-0100',
      enumerationType: 'NPI-1',
      status: 'A',
      mismatchedFields: [],
    },
    matchesInput: true,
    ...overrides,
  };
}

export function addressResult(overrides: Partial<AddressResult> = {}): AddressResult {
  return {
    source: 'TomTom Geocoding API',
    valid: true,
    confidence: 95,
    error: null,
    verifiedData: {
      formattedAddress: '100 Main St, Springfield, IL 62701',
      latitude: 39.8,
      longitude: -89.6,
      city: 'Springfield',
      state: 'IL',
      postalCode: '62701',
      matchQuality: 'exact',
    },
    matchesInput: null,
    ...overrides,
  };
}

export function phoneResult(overrides: Partial<PhoneResult> = {}): PhoneResult {
  return {
    source: 'NumVerify API',
    valid: true,
    confidence: 85,
    error: null,
    verifiedData: {
      number: '2175550100',
      country: 'United States of America',
      countryCode: 'US',
      carrier: 'Example Telecom',
      lineType: 'landline',
      localFormat: '2175550100',
      internationalFormat: '+12175550100',
    },
    matchesInput: null,
    ...overrides,
  };
}

export function webResult(overrides: Partial<WebPresenceResult> = {}): WebPresenceResult {
  return {
    source: 'Web Scraping',
    valid: true,
    confidence: 75,
    error: null,
    verifiedData: {
      url: 'https://www.janedoe.com',
      phoneOnSite: '217-555-0100',
      addressOnSite: null,
      emailOnSite: null,
      lastUpdated: '2024',
      phonesFound: ['217-555-0100'],
      addressesFound: [],
      matches: ['phone'],
    },
    matchesInput: true,
    ...overrides,
  };
}

export function failed<T extends { valid: boolean; error: string | null; verifiedData: unknown; confidence: number }>(
  base: T,
  confidence: number,
  error: string,
): T {
  return { ...base, valid: false, confidence, error, verifiedData: null };
}

export function allValid(): SourceValidations {
  return { registry: registryResult(), address: addressResult(), phone: phoneResult(), web: webResult() };
}

export function createSourceFakes() {
  const registry = vi.fn<SourceClient<RegistryData>['check']>().mockResolvedValue(registryResult());
  const address = vi.fn<SourceClient<AddressData>['check']>().mockResolvedValue(addressResult());
  const phone = vi.fn<SourceClient<PhoneData>['check']>().mockResolvedValue(phoneResult());
  const web = vi.fn<SourceClient<WebPresenceData>['check']>().mockResolvedValue(webResult());

  const sources: SourceClients = {
    registry: { source: 'NPI Registry (CMS)', check: registry },
    address: { source: 'Address Validation', check: address },
    phone: { source: 'NumVerify API', check: phone },
    web: { source: 'Web Scraping', check: web },
  };

  return { sources, checks: { registry, address, phone, web } };
}

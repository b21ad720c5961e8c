import { z } from 'zod';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import type { AddressData, AddressResult, ProviderRecord } from '../../domain/types.js';
import { logger } from '../../infrastructure/logger.js';
import { addressMatchQuality, type LocalityParts } from '../comparison/index.js';
import {
  parsePayload,
  requestFailedMessage,
  sourceFailure,
  sourceSuccess,
  type SourceClient,
  type SourceClientDeps,
} from './types.js';

export const ADDRESS_SOURCE = 'Address Validation';
export const TOMTOM_SOURCE = 'TomTom Geocoding API';
export const LOCATIONIQ_SOURCE = 'LocationIQ API';

export const NO_RESULTS_CONFIDENCE = 30;
export const REQUEST_FAILED_CONFIDENCE = 20;
export const INCOMPLETE_ADDRESS_CONFIDENCE = 30;
/** Below this the secondary provider is consulted. */
export const FALLBACK_THRESHOLD = 60;

const TOMTOM_URL = 'https://api.tomtom.com/search/2/geocode';
const LOCATIONIQ_URL = 'https://us1.locationiq.com/v1/search.php';

const log = logger.child({ module: 'source-geocoder' });

export interface GeocodeQuery extends LocalityParts {
  fullAddress: string;
}

/** Raw hit from a geocoding service before it is scored against the input. */
export interface GeocodeHit {
  formattedAddress: string;
  latitude: number | null;
  longitude: number | null;
  city: string;
  state: string;
  postalCode: string;
}

export interface GeocodingProvider {
  readonly source: string;
  geocode(query: GeocodeQuery, signal?: AbortSignal): Promise<AddressResult>;
}

const tomTomResponse = z.object({
  results: z
    .array(
      z.object({
        position: z.object({ lat: z.number(), lon: z.number() }).optional(),
        address: z
          .object({
            freeformAddress: z.string().optional(),
            municipality: z.string().default(''),
            countrySubdivision: z.string().default(''),
            postalCode: z.string().default(''),
          })
          .default({}),
      }),
    )
    .default([]),
});

const locationIqResponse = z.array(
  z.object({
    display_name: z.string().optional(),
    lat: z.coerce.number().optional(),
    lon: z.coerce.number().optional(),
    address: z
      .object({
        city: z.string().optional(),
        town: z.string().optional(),
        state: z.string().default(''),
        postcode: z.string().default(''),
      })
      .default({}),
  }),
);

/**
 * Shared request/score flow for geocoding services. Subclasses supply the
 * request and the mapping of the first hit.
 */
abstract class BaseGeocodingProvider implements GeocodingProvider {
  abstract readonly source: string;
  protected readonly deps: SourceClientDeps;
  protected readonly apiKey: string;

  constructor(deps: SourceClientDeps, apiKey: string) {
    this.deps = deps;
    this.apiKey = apiKey;
  }

  protected abstract request(query: GeocodeQuery, signal?: AbortSignal): Promise<Result<GeocodeHit | null, AppError>>;

  async geocode(query: GeocodeQuery, signal?: AbortSignal): Promise<AddressResult> {
    const hit = await this.request(query, signal);

    if (!hit.ok) {
      log.warn({ source: this.source, errorCode: hit.error.code }, 'Geocoding request failed');
      return sourceFailure(this.source, REQUEST_FAILED_CONFIDENCE, requestFailedMessage(hit.error));
    }
    if (hit.value === null) {
      return sourceFailure(this.source, NO_RESULTS_CONFIDENCE, 'No results found');
    }

    const match = addressMatchQuality(query, hit.value);
    const data: AddressData = { ...hit.value, matchQuality: match.quality };
    log.debug({ source: this.source, matchQuality: match.quality }, 'Address geocoded');
    return sourceSuccess(this.source, match.confidence, data);
  }

  protected fetch(url: string, params: Record<string, string | number>, signal?: AbortSignal) {
    return this.deps.retry.execute(() => this.deps.http.get(url, { params, signal }), signal, { source: this.source });
  }
}

export class TomTomProvider extends BaseGeocodingProvider {
  readonly source = TOMTOM_SOURCE;

  protected async request(query: GeocodeQuery, signal?: AbortSignal): Promise<Result<GeocodeHit | null, AppError>> {
    const url = `${TOMTOM_URL}/${encodeURIComponent(query.fullAddress)}.json`;
    const response = await this.fetch(url, { key: this.apiKey, limit: 1 }, signal);
    if (!response.ok) return response;

    const payload = parsePayload(tomTomResponse, response.value.data, this.source);
    if (!payload.ok) return payload;

    const [first] = payload.value.results;
    if (first === undefined) return ok(null);

    return ok({
      formattedAddress: first.address.freeformAddress ?? query.fullAddress,
      latitude: first.position?.lat ?? null,
      longitude: first.position?.lon ?? null,
      city: first.address.municipality,
      state: first.address.countrySubdivision,
      postalCode: first.address.postalCode,
    });
  }
}

export class LocationIqProvider extends BaseGeocodingProvider {
  readonly source = LOCATIONIQ_SOURCE;

  protected async request(query: GeocodeQuery, signal?: AbortSignal): Promise<Result<GeocodeHit | null, AppError>> {
    const response = await this.fetch(
      LOCATIONIQ_URL,
      { key: this.apiKey, q: query.fullAddress, format: 'json', limit: 1, addressdetails: 1 },
      signal,
    );
    if (!response.ok) return response;

    const payload = parsePayload(locationIqResponse, response.value.data, this.source);
    if (!payload.ok) return payload;

    const [first] = payload.value;
    if (first === undefined) return ok(null);

    return ok({
      formattedAddress: first.display_name ?? query.fullAddress,
      latitude: first.lat ?? null,
      longitude: first.lon ?? null,
      city: first.address.city || first.address.town || '',
      state: first.address.state,
      postalCode: first.address.postcode,
    });
  }
}

/**
 * Validates the practice address against a primary geocoder and falls back
 * to a secondary one when the primary is invalid or weak.
 */
export class AddressValidator implements SourceClient<AddressData> {
  readonly source = ADDRESS_SOURCE;
  private readonly primary: GeocodingProvider;
  private readonly secondary: GeocodingProvider;

  constructor(primary: GeocodingProvider, secondary: GeocodingProvider) {
    this.primary = primary;
    this.secondary = secondary;
  }

  async check(record: ProviderRecord, signal?: AbortSignal): Promise<AddressResult> {
    const query = toGeocodeQuery(record);
    if (!query.ok) {
      return sourceFailure(this.source, INCOMPLETE_ADDRESS_CONFIDENCE, query.error.message);
    }

    const primary = await this.primary.geocode(query.value, signal);
    if (primary.valid && primary.confidence >= FALLBACK_THRESHOLD) return primary;

    log.debug(
      { providerId: record.providerId, primaryConfidence: primary.confidence },
      'Primary geocoder inconclusive, trying secondary',
    );
    const secondary = await this.secondary.geocode(query.value, signal);
    return secondary.confidence > primary.confidence ? secondary : primary;
  }
}

export function toGeocodeQuery(record: ProviderRecord): Result<GeocodeQuery, AppError> {
  const street = record.practiceAddress.trim();
  const city = record.city.trim();
  const state = record.state.trim();
  const postalCode = record.zipCode.trim();

  if (!street || !city || !state || !postalCode) {
    return err(createAppError(ErrorCode.SOURCE_FORMAT_INVALID, 'Incomplete address information', false));
  }

  return ok({ fullAddress: `${street}, ${city}, ${state} ${postalCode}`, city, state, postalCode });
}

import type { MatchQuality } from '../../domain/types.js';
import { similarityRatio } from './similarity.js';
import { normalizeStateCode } from './state-codes.js';

export { similarityRatio } from './similarity.js';
export { normalizeStateCode } from './state-codes.js';

export const CLOSE_CITY_SIMILARITY = 0.8;
export const PARTIAL_CITY_SIMILARITY = 0.6;

export const MATCH_CONFIDENCE: Record<MatchQuality, number> = {
  exact: 95,
  close: 85,
  partial: 60,
  none: 30,
};

export interface LocalityParts {
  city: string;
  state: string;
  postalCode: string;
}

export interface AddressMatch {
  quality: MatchQuality;
  confidence: number;
}

export function digitsOnly(value: string): string {
  return value.replace(/\D/g, '');
}

/** Compares the trailing ten digits, so a leading country code is ignored. */
export function phoneDigitsMatch(a: string, b: string): boolean {
  const left = digitsOnly(a);
  const right = digitsOnly(b);
  if (!left || !right) return false;
  return left.slice(-10) === right.slice(-10);
}

/** Case-insensitive containment in either direction. */
export function namesMatch(a: string, b: string): boolean {
  const left = a.toLowerCase().trim();
  const right = b.toLowerCase().trim();
  return left.includes(right) || right.includes(left);
}

/** Postal codes compare verbatim, so ZIP+4 against a five-digit code is a mismatch. */
export function addressMatchQuality(input: LocalityParts, returned: LocalityParts): AddressMatch {
  const inputCity = input.city.toLowerCase().trim();
  const returnedCity = returned.city.toLowerCase().trim();
  const stateMatch = normalizeStateCode(input.state) === normalizeStateCode(returned.state);
  const postalMatch = input.postalCode.trim() === returned.postalCode.trim();

  if (inputCity === returnedCity && stateMatch && postalMatch) {
    return tier('exact');
  }

  const citySimilarity = similarityRatio(inputCity, returnedCity);

  if (citySimilarity > CLOSE_CITY_SIMILARITY && stateMatch) {
    return postalMatch ? tier('close') : tier('partial');
  }

  if (citySimilarity > PARTIAL_CITY_SIMILARITY && stateMatch) {
    return tier('partial');
  }

  return tier('none');
}

function tier(quality: MatchQuality): AddressMatch {
  return { quality, confidence: MATCH_CONFIDENCE[quality] };
}

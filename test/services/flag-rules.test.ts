import { describe, it, expect } from 'vitest';
import { generateFlags } from '../../src/services/flags/rules.js';
import type { SourceValidations } from '../../src/domain/types.js';
import {
  addressResult,
  allValid,
  failed,
  phoneResult,
  providerRecord,
  registryResult,
  webResult,
} from '../helpers/fixtures.js';

const record = providerRecord();
const now = new Date('2024-03-01T12:00:00Z');

function sequentialIds() {
  let next = 0;
  return () => `flag-${++next}`;
}

function flagsFor(validations: SourceValidations) {
  return generateFlags('PRV-1', validations, record, { now, newId: sequentialIds() });
}

const timedOut = 'API request failed: Request to example.test timed out';

describe('generateFlags', () => {
  it('raises nothing when every source validates', () => {
    expect(flagsFor(allValid())).toEqual([]);
  });

  it('flags an NPI missing from the registry', () => {
    const flags = flagsFor({
      ...allValid(),
      registry: { ...failed(registryResult(), 0, 'NPI not found in registry'), matchesInput: false },
    });

    expect(flags).toEqual([
      {
        id: 'flag-1',
        providerId: 'PRV-1',
        flagType: 'CRITICAL',
        severity: 'high',
        field: 'npi',
        message: 'NPI not found in registry or invalid',
        details: { error: 'NPI not found in registry', npi: '1234567893' },
        resolved: false,
        resolvedAt: null,
        createdAt: now,
      },
    ]);
  });

  it('flags a registry entry that belongs to someone else', () => {
    const registry = registryResult({ confidence: 60, matchesInput: false });
    const [flag] = flagsFor({
      ...allValid(),
      registry: {
        ...registry,
        verifiedData: registry.verifiedData && { ...registry.verifiedData, name: 'JOHN ROE', mismatchedFields: ['name'] },
      },
    });

    expect(flag?.message).toBe('NPI belongs to different provider - name mismatch');
    expect(flag?.details).toEqual({ input_name: 'Jane Doe', npi_name: 'JOHN ROE', mismatched_fields: ['name'] });
  });

  it('warns on a weak address match', () => {
    const flags = flagsFor({
      ...allValid(),
      address: addressResult({
        confidence: 30,
        verifiedData: {
          formattedAddress: '100 Main St, Peoria, IL 61602',
          latitude: null,
          longitude: null,
          city: 'Peoria',
          state: 'IL',
          postalCode: '61602',
          matchQuality: 'none',
        },
      }),
    });

    expect(flags.map((f) => [f.flagType, f.field, f.message])).toEqual([
      ['WARNING', 'address', 'Address partial match only - verify address'],
    ]);
    expect(flags[0]?.details).toEqual({ confidence: 30, match_quality: 'none' });
  });

  it('warns on a phone with unknown line type and no carrier', () => {
    const flags = flagsFor({
      ...allValid(),
      phone: phoneResult({
        confidence: 20,
        verifiedData: {
          number: '5555555555',
          country: '',
          countryCode: '',
          carrier: '',
          lineType: 'unknown',
          localFormat: '',
          internationalFormat: '',
        },
      }),
    });

    expect(flags.map((f) => f.message)).toEqual(['Phone number may be disconnected - carrier unknown']);
    expect(flags[0]?.details).toEqual({ line_type: 'unknown' });
  });

  it('warns when the website shows contradicting details', () => {
    const web = webResult();
    const flags = flagsFor({
      ...allValid(),
      web: { ...web, confidence: 50, verifiedData: web.verifiedData && { ...web.verifiedData, matches: [] } },
    });

    expect(flags.map((f) => [f.flagType, f.message])).toEqual([
      ['WARNING', 'Website information contradicts input data'],
    ]);
    expect(flags[0]?.details).toEqual({ confidence: 50, matches: [] });
  });

  it('raises every failure flag in rule order when all sources fail', () => {
    const flags = flagsFor({
      registry: failed(registryResult(), 0, 'Invalid NPI format'),
      address: failed(addressResult(), 20, timedOut),
      phone: failed(phoneResult(), 50, timedOut),
      web: failed(webResult(), 50, 'No website found'),
    });

    expect(flags.map((f) => [f.flagType, f.field])).toEqual([
      ['CRITICAL', 'npi'],
      ['CRITICAL', 'address'],
      ['WARNING', 'phone'],
      ['INFO', 'website'],
      ['CRITICAL', 'all'],
    ]);
    expect(flags.map((f) => f.id)).toEqual(['flag-1', 'flag-2', 'flag-3', 'flag-4', 'flag-5']);
    expect(flags[4]?.details).toEqual({ npi_valid: false, address_valid: false, phone_valid: false });
    expect(flags[1]?.details).toEqual({ error: timedOut, input_address: '100 Main St, Springfield, IL' });
  });

  it('warns when only one of several sources validates', () => {
    const flags = flagsFor({
      registry: registryResult(),
      address: failed(addressResult(), 20, timedOut),
      phone: failed(phoneResult(), 40, 'Phone number is not valid'),
      web: failed(webResult(), 50, 'No website found'),
    });

    expect(flags.map((f) => f.field)).toEqual(['address', 'phone', 'website', 'multiple']);
    expect(flags[3]?.details).toEqual({ valid_sources: 1, total_sources: 4 });
  });

  it('raises both conflict flags when only the website validates', () => {
    const flags = flagsFor({
      registry: failed(registryResult(), 0, 'Invalid NPI format'),
      address: failed(addressResult(), 30, 'Incomplete address information'),
      phone: failed(phoneResult(), 40, 'No phone number provided'),
      web: webResult(),
    });

    expect(flags.map((f) => f.field)).toEqual(['npi', 'address', 'phone', 'multiple', 'all']);
  });

  it('skips rules for unreached sources', () => {
    expect(flagsFor({ registry: registryResult(), address: null, phone: null, web: null })).toEqual([]);
  });

  it('produces the same flags for the same inputs', () => {
    const validations = {
      ...allValid(),
      phone: failed(phoneResult(), 40, 'Phone number is not valid'),
    };

    const strip = (flags: ReturnType<typeof flagsFor>) => flags.map(({ id: _id, ...rest }) => rest);
    expect(strip(flagsFor(validations))).toEqual(strip(flagsFor(validations)));
  });
});

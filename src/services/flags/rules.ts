import { randomUUID } from 'node:crypto';
import type { Flag, FlagField, FlagSeverity, FlagType, ProviderRecord, SourceValidations } from '../../domain/types.js';

export interface FlagOptions {
  now?: Date;
  newId?: () => string;
}

type FlagDraft = Pick<Flag, 'flagType' | 'severity' | 'field' | 'message' | 'details'>;

function draft(
  flagType: FlagType,
  severity: FlagSeverity,
  field: FlagField,
  message: string,
  details: Record<string, unknown>,
): FlagDraft {
  return { flagType, severity, field, message, details };
}

function registryFlags(v: SourceValidations, record: ProviderRecord): FlagDraft[] {
  const registry = v.registry;
  if (registry === null) return [];

  if (!registry.valid) {
    return [
      draft('CRITICAL', 'high', 'npi', 'NPI not found in registry or invalid', {
        error: registry.error ?? 'Unknown error',
        npi: record.npi,
      }),
    ];
  }

  if (registry.matchesInput === false) {
    return [
      draft('CRITICAL', 'high', 'npi', 'NPI belongs to different provider - name mismatch', {
        input_name: record.fullName,
        npi_name: registry.verifiedData?.name ?? '',
        mismatched_fields: registry.verifiedData?.mismatchedFields ?? [],
      }),
    ];
  }

  return [];
}

function addressFlags(v: SourceValidations, record: ProviderRecord): FlagDraft[] {
  const address = v.address;
  if (address === null) return [];

  if (!address.valid) {
    return [
      draft('CRITICAL', 'high', 'address', 'Address completely invalid or cannot be geocoded', {
        error: address.error ?? 'Unknown error',
        input_address: `${record.practiceAddress}, ${record.city}, ${record.state}`,
      }),
    ];
  }

  if (address.confidence < 60) {
    return [
      draft('WARNING', 'medium', 'address', 'Address partial match only - verify address', {
        confidence: address.confidence,
        match_quality: address.verifiedData?.matchQuality ?? 'unknown',
      }),
    ];
  }

  return [];
}

function phoneFlags(v: SourceValidations, record: ProviderRecord): FlagDraft[] {
  const phone = v.phone;
  if (phone === null) return [];

  if (!phone.valid) {
    return [
      draft('WARNING', 'medium', 'phone', 'Phone number validation failed', {
        error: phone.error ?? 'Unknown error',
        input_phone: record.phone,
      }),
    ];
  }

  const data = phone.verifiedData;
  if (data && data.lineType === 'unknown' && !data.carrier) {
    return [
      draft('WARNING', 'medium', 'phone', 'Phone number may be disconnected - carrier unknown', {
        line_type: data.lineType,
      }),
    ];
  }

  return [];
}

function websiteFlags(v: SourceValidations): FlagDraft[] {
  const web = v.web;
  if (web === null) return [];

  if (!web.valid) {
    return [
      draft('INFO', 'low', 'website', 'No website found for provider', {
        error: web.error ?? 'No website found',
      }),
    ];
  }

  if (web.confidence < 60) {
    return [
      draft('WARNING', 'medium', 'website', 'Website information contradicts input data', {
        confidence: web.confidence,
        matches: web.verifiedData?.matches ?? [],
      }),
    ];
  }

  return [];
}

function crossSourceFlags(v: SourceValidations): FlagDraft[] {
  const drafts: FlagDraft[] = [];
  const reached = [v.registry, v.address, v.phone, v.web].filter((r) => r !== null);
  const validCount = reached.filter((r) => r?.valid).length;

  if (validCount === 1 && reached.length > 1) {
    drafts.push(
      draft('WARNING', 'medium', 'multiple', 'Multiple data source conflicts - only one source validated successfully', {
        valid_sources: validCount,
        total_sources: reached.length,
      }),
    );
  }

  const registryValid = v.registry?.valid ?? false;
  const addressValid = v.address?.valid ?? false;
  const phoneValid = v.phone?.valid ?? false;
  if (!registryValid && !addressValid && !phoneValid) {
    drafts.push(
      draft('CRITICAL', 'high', 'all', 'All contact methods failed validation', {
        npi_valid: registryValid,
        address_valid: addressValid,
        phone_valid: phoneValid,
      }),
    );
  }

  return drafts;
}

/**
 * Applies the flag rules in a fixed order. The same validations always yield
 * the same flags in the same order; only ids and timestamps differ.
 */
export function generateFlags(
  providerId: string,
  validations: SourceValidations,
  record: ProviderRecord,
  options: FlagOptions = {},
): Flag[] {
  const createdAt = options.now ?? new Date();
  const newId = options.newId ?? randomUUID;

  const drafts = [
    ...registryFlags(validations, record),
    ...addressFlags(validations, record),
    ...phoneFlags(validations, record),
    ...websiteFlags(validations),
    ...crossSourceFlags(validations),
  ];

  return drafts.map((d) => ({
    ...d,
    id: newId(),
    providerId,
    resolved: false,
    resolvedAt: null,
    createdAt,
  }));
}

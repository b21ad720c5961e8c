export const VALIDATION_STATUSES = [
  'PENDING',
  'VALIDATED',
  'PARTIAL',
  'FLAGGED',
  'ERROR',
] as const;

export type ValidationStatus = (typeof VALIDATION_STATUSES)[number];

export const FLAG_TYPES = ['CRITICAL', 'WARNING', 'INFO'] as const;

export type FlagType = (typeof FLAG_TYPES)[number];

export const FLAG_SEVERITIES = ['high', 'medium', 'low'] as const;

export type FlagSeverity = (typeof FLAG_SEVERITIES)[number];

export const FLAG_FIELDS = ['npi', 'address', 'phone', 'website', 'multiple', 'all'] as const;

export type FlagField = (typeof FLAG_FIELDS)[number];

export const JOB_STATUSES = [
  'PENDING',
  'PROCESSING',
  'COMPLETED',
  'FAILED',
  'CANCELLED',
] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export const SOURCE_NAMES = ['registry', 'address', 'phone', 'web'] as const;

export type SourceName = (typeof SOURCE_NAMES)[number];

export interface ProviderRecord {
  providerId: string;
  npi: string;
  firstName: string;
  lastName: string;
  fullName: string;
  specialty: string;
  practiceAddress: string;
  city: string;
  state: string;
  zipCode: string;
  phone: string;
  email: string | null;
  website: string | null;
}

export interface StoredProvider extends ProviderRecord {
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Uniform per-source outcome. Every key is always present; `verifiedData` and
 * `error` are never both set.
 */
export interface SourceResult<TData> {
  source: string;
  valid: boolean;
  confidence: number;
  error: string | null;
  verifiedData: TData | null;
  matchesInput: boolean | null;
}

export type InputMismatch = 'name' | 'address' | 'phone';

export interface RegistryAddress {
  address1: string;
  city: string;
  state: string;
  postalCode: string;
  countryCode: string;
}

export interface RegistryData {
  npi: string;
  name: string;
  organizationName: string;
  taxonomy: string;
  address: RegistryAddress;
  phone: string;
  enumerationType: string;
  status: string;
  mismatchedFields: InputMismatch[];
}

export type MatchQuality = 'exact' | 'close' | 'partial' | 'none';

export interface AddressData {
  formattedAddress: string;
  latitude: number | null;
  longitude: number | null;
  city: string;
  state: string;
  postalCode: string;
  matchQuality: MatchQuality;
}

export interface PhoneData {
  number: string;
  country: string;
  countryCode: string;
  carrier: string;
  lineType: string;
  localFormat: string;
  internationalFormat: string;
}

export type WebMatch = 'phone' | 'address';

export interface WebPresenceData {
  url: string;
  phoneOnSite: string | null;
  addressOnSite: string | null;
  emailOnSite: string | null;
  lastUpdated: string | null;
  phonesFound: string[];
  addressesFound: string[];
  matches: WebMatch[];
}

export type RegistryResult = SourceResult<RegistryData>;
export type AddressResult = SourceResult<AddressData>;
export type PhoneResult = SourceResult<PhoneData>;
export type WebPresenceResult = SourceResult<WebPresenceData>;

/** `null` marks a source that was never reached for this run. */
export interface SourceValidations {
  registry: RegistryResult | null;
  address: AddressResult | null;
  phone: PhoneResult | null;
  web: WebPresenceResult | null;
}

export interface Flag {
  id: string;
  providerId: string;
  flagType: FlagType;
  severity: FlagSeverity;
  field: FlagField;
  message: string;
  details: Record<string, unknown>;
  resolved: boolean;
  resolvedAt: Date | null;
  createdAt: Date;
}

export interface ValidationResult {
  providerId: string;
  jobId: string | null;
  timestamp: Date;
  durationSeconds: number;
  validations: SourceValidations;
  overallConfidence: number;
  status: ValidationStatus;
  flags: Flag[];
  anomalies: string[];
  recommendations: string[];
  sourcesUsed: string[];
  error: string | null;
}

export interface ProcessingJob {
  id: string;
  filename: string | null;
  totalProviders: number;
  status: JobStatus;
  processedCount: number;
  successCount: number;
  errorCount: number;
  startedAt: Date | null;
  completedAt: Date | null;
  errorMessage: string | null;
  createdAt: Date;
}

export interface ConfidenceAdjustment {
  reason: string;
  penalty: number;
}

export interface StoredValidationResult extends ValidationResult {
  id: string;
}

import type { SourceValidations } from '../../domain/types.js';

export const Anomaly = {
  LOW_CONFIDENCE_ALL_VALID: 'Low overall confidence despite all sources being valid',
  HIGH_CONFIDENCE_REGISTRY_INVALID: 'High confidence but NPI validation failed',
  PARTIAL_ADDRESS: 'Address validation shows partial match - may need review',
  PHONE_MAYBE_DISCONNECTED: 'Phone number may be disconnected despite high confidence',
} as const;

/** Informational only; never feeds back into confidence or status. */
export function detectAnomalies(validations: SourceValidations, overallConfidence: number): string[] {
  const anomalies: string[] = [];
  const reached = [validations.registry, validations.address, validations.phone, validations.web].filter(
    (v): v is NonNullable<typeof v> => v !== null,
  );

  if (overallConfidence < 60 && reached.length > 0 && reached.every((v) => v.valid)) {
    anomalies.push(Anomaly.LOW_CONFIDENCE_ALL_VALID);
  }

  if (overallConfidence > 80 && !(validations.registry?.valid ?? false)) {
    anomalies.push(Anomaly.HIGH_CONFIDENCE_REGISTRY_INVALID);
  }

  const addressConfidence = validations.address?.confidence ?? 0;
  if (addressConfidence > 40 && addressConfidence < 70) {
    anomalies.push(Anomaly.PARTIAL_ADDRESS);
  }

  const phone = validations.phone?.verifiedData;
  if (phone && phone.lineType === 'unknown' && !phone.carrier && overallConfidence > 70) {
    anomalies.push(Anomaly.PHONE_MAYBE_DISCONNECTED);
  }

  return anomalies;
}

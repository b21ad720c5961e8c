import type { ConfidenceAdjustment, SourceName, SourceValidations } from '../../domain/types.js';

export const SOURCE_WEIGHTS: Record<SourceName, number> = {
  registry: 0.4,
  address: 0.3,
  phone: 0.2,
  web: 0.1,
};

export const Penalty = {
  REGISTRY_CONTRADICTED: 10,
  SINGLE_SOURCE: 5,
  REGISTRY_MISMATCH: 15,
} as const;

export interface FusedConfidence {
  overallConfidence: number;
  adjustments: ConfidenceAdjustment[];
}

/**
 * Weighted sum of per-source confidences minus consistency penalties,
 * clamped to 0..100 and rounded to two decimals.
 */
export function computeOverallConfidence(validations: SourceValidations): FusedConfidence {
  const weighted =
    (validations.registry?.confidence ?? 0) * SOURCE_WEIGHTS.registry +
    (validations.address?.confidence ?? 0) * SOURCE_WEIGHTS.address +
    (validations.phone?.confidence ?? 0) * SOURCE_WEIGHTS.phone +
    (validations.web?.confidence ?? 0) * SOURCE_WEIGHTS.web;

  const adjustments = consistencyPenalties(validations);
  const penalty = adjustments.reduce((sum, a) => sum + a.penalty, 0);
  const clamped = Math.min(100, Math.max(0, weighted - penalty));

  return { overallConfidence: Math.round(clamped * 100) / 100, adjustments };
}

export function consistencyPenalties(validations: SourceValidations): ConfidenceAdjustment[] {
  const registryValid = validations.registry?.valid ?? false;
  const addressValid = validations.address?.valid ?? false;
  const phoneValid = validations.phone?.valid ?? false;
  const adjustments: ConfidenceAdjustment[] = [];

  if (!registryValid && (addressValid || phoneValid)) {
    adjustments.push({ reason: 'Registry invalid while other sources validate', penalty: Penalty.REGISTRY_CONTRADICTED });
  }

  const validCount = [registryValid, addressValid, phoneValid].filter(Boolean).length;
  if (validCount === 1) {
    adjustments.push({ reason: 'Only one core source validated', penalty: Penalty.SINGLE_SOURCE });
  }

  if (validations.registry?.matchesInput === false) {
    adjustments.push({ reason: 'Registry entry does not match submitted record', penalty: Penalty.REGISTRY_MISMATCH });
  }

  return adjustments;
}

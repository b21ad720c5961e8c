import type { ValidationResult } from '../../domain/types.js';

export type QualityLevel = 'HIGH' | 'MEDIUM' | 'LOW';

export interface QualityAssessment {
  qualityScore: number;
  qualityLevel: QualityLevel;
  criticalIssues: number;
  warnings: number;
  totalFlags: number;
}

export function assessQuality(result: Pick<ValidationResult, 'overallConfidence' | 'flags'>): QualityAssessment {
  const criticalIssues = result.flags.filter((f) => f.flagType === 'CRITICAL').length;
  const warnings = result.flags.filter((f) => f.flagType === 'WARNING').length;

  let qualityLevel: QualityLevel = 'HIGH';
  if (result.overallConfidence < 60 || criticalIssues > 0) {
    qualityLevel = 'LOW';
  } else if (result.overallConfidence < 80 || warnings > 2) {
    qualityLevel = 'MEDIUM';
  }

  return {
    qualityScore: result.overallConfidence,
    qualityLevel,
    criticalIssues,
    warnings,
    totalFlags: result.flags.length,
  };
}

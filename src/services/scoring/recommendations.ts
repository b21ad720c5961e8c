import type { Flag, SourceValidations } from '../../domain/types.js';

export function generateRecommendations(
  validations: SourceValidations,
  overallConfidence: number,
  flags: readonly Flag[],
): string[] {
  if (overallConfidence >= 80 && flags.length === 0) {
    return ['Provider successfully validated across all sources', 'High confidence score - no manual review needed'];
  }

  const recommendations: string[] = [];

  if (!(validations.registry?.valid ?? false)) {
    recommendations.push('CRITICAL: NPI not found in registry - verify NPI number');
  }
  if ((validations.address?.confidence ?? 0) < 60) {
    recommendations.push('WARNING: Address validation shows low confidence - verify address');
  }
  if ((validations.phone?.confidence ?? 0) < 60) {
    recommendations.push('WARNING: Phone number validation failed - verify phone number');
  }

  const critical = flags.filter((f) => f.flagType === 'CRITICAL').length;
  if (critical > 0) {
    recommendations.push(`CRITICAL: ${critical} critical issue(s) require immediate attention`);
  }

  const warnings = flags.filter((f) => f.flagType === 'WARNING').length;
  if (warnings > 0) {
    recommendations.push(`WARNING: ${warnings} warning(s) need review`);
  }

  return recommendations.length > 0 ? recommendations : ['Provider data validated with minor issues'];
}

export { computeOverallConfidence, consistencyPenalties, SOURCE_WEIGHTS, Penalty } from './fusion.js';
export type { FusedConfidence } from './fusion.js';
export { detectAnomalies, Anomaly } from './anomalies.js';
export { generateRecommendations } from './recommendations.js';
export { assessQuality } from './quality.js';
export type { QualityAssessment, QualityLevel } from './quality.js';

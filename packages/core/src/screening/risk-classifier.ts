import type { RiskLevel, RiskThresholds } from '@lexiscreen/shared/src/types/screening.types.js';

export const DEFAULT_RISK_THRESHOLDS: RiskThresholds = { high: 0.8, medium: 0.6 };

// Boundary values belong to the upper tier.
export function classifyRisk(
  confidence: number,
  thresholds: RiskThresholds = DEFAULT_RISK_THRESHOLDS,
): RiskLevel {
  if (confidence >= thresholds.high) return 'High';
  if (confidence >= thresholds.medium) return 'Moderate';
  return 'Low';
}

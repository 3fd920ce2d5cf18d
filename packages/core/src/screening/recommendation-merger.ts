import type { RiskLevel, RiskThresholds } from '@lexiscreen/shared/src/types/screening.types.js';
import { classifyRisk, DEFAULT_RISK_THRESHOLDS } from './risk-classifier.js';

export const TIER_RECOMMENDATIONS: Readonly<Record<RiskLevel, string>> = {
  High: 'Strong indicators suggest professional dyslexia assessment is recommended',
  Moderate: 'Some indicators present - consider educational support strategies',
  Low: 'Low-level indicators - continue monitoring and supportive practices',
};

export const GENERAL_RECOMMENDATIONS: readonly string[] = [
  'Use multi-sensory learning approaches',
  'Provide extra time for reading and writing tasks',
  'Consider assistive technology tools',
  'Regular practice with structured literacy programs',
];

/**
 * Concatenates the per-modality lists in the order given, then the tier
 * recommendation for `overallConfidence`, then the general block. Duplicates
 * keep their first position.
 */
export function mergeRecommendations(
  modalityRecommendations: readonly (readonly string[])[],
  overallConfidence: number,
  thresholds: RiskThresholds = DEFAULT_RISK_THRESHOLDS,
): string[] {
  const combined = [
    ...modalityRecommendations.flat(),
    TIER_RECOMMENDATIONS[classifyRisk(overallConfidence, thresholds)],
    ...GENERAL_RECOMMENDATIONS,
  ];
  return [...new Set(combined)];
}

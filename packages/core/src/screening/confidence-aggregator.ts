import { clamp, mean, populationVariance } from '@lexiscreen/shared/src/utils/math.js';

export interface ConfidenceAggregationOptions {
  /** Multiplier applied to the population variance of the scores. */
  readonly penaltyFactor: number;
  /** Upper bound on the variance penalty. */
  readonly penaltyCap: number;
  /** Returned when there is nothing to aggregate. */
  readonly neutral: number;
}

export const DEFAULT_AGGREGATION_OPTIONS: ConfidenceAggregationOptions = {
  penaltyFactor: 0.5,
  penaltyCap: 0.3,
  neutral: 0.5,
};

/**
 * Mean of the per-modality scores, lowered when the modalities disagree.
 * A single score passes through unchanged apart from clamping to [0, 1].
 */
export function aggregateConfidence(
  scores: readonly number[],
  options: ConfidenceAggregationOptions = DEFAULT_AGGREGATION_OPTIONS,
): number {
  if (scores.length === 0) {
    return options.neutral;
  }

  const average = mean(scores);
  if (scores.length === 1) {
    return clamp(average, 0, 1);
  }

  const penalty = Math.min(populationVariance(scores, average) * options.penaltyFactor, options.penaltyCap);
  return clamp(average - penalty, 0, 1);
}

import { describe, it, expect } from 'vitest';
import { aggregateConfidence } from './confidence-aggregator.js';

describe('aggregateConfidence', () => {
  it('should return the neutral default for no scores', () => {
    expect(aggregateConfidence([])).toBe(0.5);
  });

  it('should pass a single score through unchanged', () => {
    expect(aggregateConfidence([0.35])).toBe(0.35);
  });

  it('should return identical scores unchanged', () => {
    expect(aggregateConfidence([0.7, 0.7, 0.7])).toBe(0.7);
    expect(aggregateConfidence([0.2, 0.2])).toBe(0.2);
  });

  it('should penalize disagreement below the plain mean', () => {
    // mean 0.5, variance 0.25, penalty 0.125
    const result = aggregateConfidence([0, 1]);

    expect(result).toBe(0.375);
    expect(result).toBeLessThan(0.5);
    expect(result).toBeGreaterThanOrEqual(0);
  });

  it('should scale the penalty with the variance', () => {
    // mean 0.5, variance 0.16, penalty 0.08
    expect(aggregateConfidence([0.9, 0.1])).toBeCloseTo(0.42, 10);
  });

  it('should cap the penalty', () => {
    // mean 1, variance 4, penalty capped at 0.3
    expect(aggregateConfidence([-1, 3])).toBeCloseTo(0.7, 10);
  });

  it('should clamp out-of-range scores into [0, 1]', () => {
    expect(aggregateConfidence([1.4])).toBe(1);
    expect(aggregateConfidence([-0.2])).toBe(0);
    expect(aggregateConfidence([1.2, 1.2])).toBe(1);
  });

  it('should honour explicit options', () => {
    const options = { penaltyFactor: 1, penaltyCap: 1, neutral: 0.4 };

    expect(aggregateConfidence([], options)).toBe(0.4);
    expect(aggregateConfidence([0, 1], options)).toBe(0.25);
  });
});

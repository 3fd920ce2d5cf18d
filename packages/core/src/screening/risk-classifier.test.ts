import { describe, it, expect } from 'vitest';
import type { RiskLevel } from '@lexiscreen/shared/src/types/screening.types.js';
import { RISK_LEVELS } from '@lexiscreen/shared/src/types/screening.types.js';
import { classifyRisk } from './risk-classifier.js';

describe('classifyRisk', () => {
  it('should assign boundary values to the upper tier', () => {
    expect(classifyRisk(0.8)).toBe('High');
    expect(classifyRisk(0.6)).toBe('Moderate');
  });

  it('should classify values just below each boundary into the lower tier', () => {
    expect(classifyRisk(0.79)).toBe('Moderate');
    expect(classifyRisk(0.59)).toBe('Low');
  });

  it('should cover the extremes', () => {
    expect(classifyRisk(0)).toBe('Low');
    expect(classifyRisk(1)).toBe('High');
  });

  it('should be monotonically non-decreasing in tier', () => {
    let previous: RiskLevel = 'Low';
    for (let i = 0; i <= 100; i++) {
      const level = classifyRisk(i / 100);
      expect(RISK_LEVELS.indexOf(level)).toBeGreaterThanOrEqual(RISK_LEVELS.indexOf(previous));
      previous = level;
    }
  });

  it('should use explicit thresholds', () => {
    const thresholds = { high: 0.7, medium: 0.4 };

    expect(classifyRisk(0.7, thresholds)).toBe('High');
    expect(classifyRisk(0.5, thresholds)).toBe('Moderate');
    expect(classifyRisk(0.39, thresholds)).toBe('Low');
  });
});

import { describe, it, expect } from 'vitest';
import { clamp, longestCommonSubsequenceLength, mean, populationVariance } from './math.js';

describe('mean', () => {
  it('should return 0 for an empty list', () => {
    expect(mean([])).toBe(0);
  });

  it('should average the values', () => {
    expect(mean([0.2, 0.4, 0.9])).toBeCloseTo(0.5);
  });

  it('should return identical values exactly', () => {
    expect(mean([0.7, 0.7, 0.7])).toBe(0.7);
  });
});

describe('populationVariance', () => {
  it('should divide by the number of values', () => {
    // mean 0.5, squared deviations 0.25 + 0.25
    expect(populationVariance([0, 1])).toBe(0.25);
  });

  it('should be 0 for identical values', () => {
    expect(populationVariance([0.7, 0.7, 0.7])).toBe(0);
  });

  it('should accept a precomputed center', () => {
    expect(populationVariance([1, 3], 2)).toBe(1);
  });
});

describe('clamp', () => {
  it('should bound values on both sides', () => {
    expect(clamp(-0.2, 0, 1)).toBe(0);
    expect(clamp(1.4, 0, 1)).toBe(1);
    expect(clamp(0.3, 0, 1)).toBe(0.3);
  });
});

describe('longestCommonSubsequenceLength', () => {
  it('should return 0 when either side is empty', () => {
    expect(longestCommonSubsequenceLength([], ['a'])).toBe(0);
    expect(longestCommonSubsequenceLength(['a'], [])).toBe(0);
  });

  it('should count words shared in order', () => {
    const expected = ['the', 'cat', 'sat', 'on', 'the', 'mat'];
    const spoken = ['the', 'cat', 'on', 'a', 'mat'];
    expect(longestCommonSubsequenceLength(expected, spoken)).toBe(4);
  });
});

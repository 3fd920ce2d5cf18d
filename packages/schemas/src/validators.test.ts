import { describe, it, expect } from 'vitest';
import { validateModalityAnalysis, validateScreeningConfig } from './validators.js';
import { DEFAULT_SCREENING_CONFIG } from './screening-config.schema.js';
import { SchemaValidationError } from '@lexiscreen/shared/src/utils/errors.js';

describe('validateScreeningConfig', () => {
  it('should fill every default from an empty object', () => {
    const config = validateScreeningConfig({});
    expect(config.thresholds).toEqual({ high: 0.8, medium: 0.6 });
    expect(config.variancePenalty).toEqual({ factor: 0.5, cap: 0.3 });
    expect(config.neutralConfidence).toBe(0.5);
    expect(config.modalityTimeoutMs).toBe(30000);
    expect(config.indicators.wordReversals).toEqual(['was/saw', 'on/no', 'left/felt']);
    expect(config.media.audioExtensions).toContain('.wav');
  });

  it('should match DEFAULT_SCREENING_CONFIG', () => {
    expect(validateScreeningConfig({})).toEqual(DEFAULT_SCREENING_CONFIG);
  });

  it('should keep a partial threshold override and default the rest', () => {
    const config = validateScreeningConfig({ thresholds: { high: 0.9 } });
    expect(config.thresholds).toEqual({ high: 0.9, medium: 0.6 });
  });

  it('should reject a medium threshold at or above the high threshold', () => {
    expect(() => validateScreeningConfig({ thresholds: { high: 0.6, medium: 0.6 } })).toThrow(
      SchemaValidationError,
    );
  });

  it('should reject thresholds outside [0, 1]', () => {
    expect(() => validateScreeningConfig({ thresholds: { high: 1.2 } })).toThrow(
      SchemaValidationError,
    );
  });

  it('should reject a malformed reversal pair', () => {
    expect(() =>
      validateScreeningConfig({ indicators: { wordReversals: ['was-saw'] } }),
    ).toThrow(SchemaValidationError);
  });

  it('should reject a non-positive timeout', () => {
    expect(() => validateScreeningConfig({ modalityTimeoutMs: 0 })).toThrow(SchemaValidationError);
  });

  it('should accept the largest timer delay and reject anything above it', () => {
    expect(validateScreeningConfig({ modalityTimeoutMs: 2_147_483_647 }).modalityTimeoutMs).toBe(
      2_147_483_647,
    );
    expect(() => validateScreeningConfig({ modalityTimeoutMs: 3_000_000_000 })).toThrow(
      SchemaValidationError,
    );
  });

  it('should include validation error details', () => {
    try {
      validateScreeningConfig({ thresholds: { high: 0.5, medium: 0.7 } });
      expect.fail('Should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaValidationError);
      expect((error as SchemaValidationError).validationErrors).toEqual([
        'thresholds.medium: medium threshold must be below high threshold',
      ]);
    }
  });
});

describe('validateModalityAnalysis', () => {
  it('should accept a well-formed analysis and default missing details', () => {
    const result = validateModalityAnalysis(
      { confidence: 0.4, recommendations: ['Read aloud daily'] },
      'text',
    );
    expect(result).toEqual({ confidence: 0.4, recommendations: ['Read aloud daily'], details: {} });
  });

  it('should leave out-of-range confidence for the caller to clamp', () => {
    const result = validateModalityAnalysis({ confidence: 1.7, recommendations: [] }, 'speech');
    expect(result.confidence).toBe(1.7);
  });

  it('should reject NaN confidence', () => {
    expect(() =>
      validateModalityAnalysis({ confidence: Number.NaN, recommendations: [] }, 'handwriting'),
    ).toThrow('handwriting analyzer returned invalid output');
  });

  it('should reject non-string recommendations', () => {
    expect(() =>
      validateModalityAnalysis({ confidence: 0.2, recommendations: [3] }, 'text'),
    ).toThrow(SchemaValidationError);
  });
});

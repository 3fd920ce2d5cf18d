import { describe, it, expect } from 'vitest';
import { DEFAULT_SCREENING_CONFIG } from '@lexiscreen/schemas/src/screening-config.schema.js';
import { ModalityAnalysisError } from '@lexiscreen/shared/src/utils/errors.js';
import { createTextAnalyzer, TEXT_RECOMMENDATIONS } from './analyzer.js';
import { sanitizeText } from './tokenize.js';

const analyzer = createTextAnalyzer(DEFAULT_SCREENING_CONFIG.indicators);

describe('createTextAnalyzer', () => {
  it('should report the text modality', () => {
    expect(analyzer.modality).toBe('text');
  });

  it('should score a was/saw collision as one indicator', async () => {
    const result = await analyzer.analyze({ text: 'I was on the saw' });

    expect(result.confidence).toBeCloseTo(0.4);
    expect(result.recommendations).toEqual([
      TEXT_RECOMMENDATIONS.reversals,
      TEXT_RECOMMENDATIONS.shortWords,
    ]);
    expect(result.details).toMatchObject({
      wordCount: 5,
      sentenceCount: 0,
      averageWordLength: 2.4,
      complexWordCount: 0,
      reversals: ["Potential word reversal: 'was' / 'saw'"],
      phoneticSpellings: [],
    });
  });

  it('should score text without indicators at the base confidence', async () => {
    const result = await analyzer.analyze({
      text: 'Yesterday afternoon everyone visited grandmother. Wonderful conversation followed!',
    });

    expect(result.confidence).toBeCloseTo(0.2);
    expect(result.recommendations).toEqual([]);
    expect(result.details).toMatchObject({
      wordCount: 8,
      sentenceCount: 2,
      complexWordCount: 7,
    });
  });

  it('should cap confidence at 0.9', async () => {
    const result = await analyzer.analyze({
      text: 'was saw on no left felt bad dad fone enuf',
    });

    expect(result.confidence).toBe(0.9);
    expect(result.recommendations).toEqual([
      TEXT_RECOMMENDATIONS.reversals,
      TEXT_RECOMMENDATIONS.phoneticSpellings,
      TEXT_RECOMMENDATIONS.shortWords,
    ]);
  });

  it('should reject empty text', async () => {
    await expect(analyzer.analyze({ text: '  \u0000 ' })).rejects.toThrow(ModalityAnalysisError);
    await expect(analyzer.analyze({ text: '...' })).rejects.toThrow('Empty text input');
  });
});

describe('sanitizeText', () => {
  it('should strip NUL bytes, trim, and truncate', () => {
    expect(sanitizeText('  ab\u0000c  ')).toBe('abc');
    expect(sanitizeText('x'.repeat(10_050))).toHaveLength(10_000);
  });
});

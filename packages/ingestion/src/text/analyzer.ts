import type { ModalityAnalysis } from '@lexiscreen/shared/src/types/screening.types.js';
import type { IndicatorConfig } from '@lexiscreen/schemas/src/screening-config.schema.js';
import { createChildLogger } from '@lexiscreen/shared/src/logger.js';
import { ModalityAnalysisError } from '@lexiscreen/shared/src/utils/errors.js';
import type { TextAnalysisInput, TextAnalyzer } from '../types.js';
import { sanitizeText, tokenize } from './tokenize.js';
import {
  detectLetterReversals,
  detectPhoneticSpellings,
  detectWordReversals,
  parsePairs,
} from './indicators.js';

const log = createChildLogger('ingestion:text');

const BASE_CONFIDENCE = 0.2;
const CONFIDENCE_PER_INDICATOR = 0.2;
const MAX_CONFIDENCE = 0.9;
const COMPLEX_WORD_LENGTH = 7;
const SHORT_AVERAGE_WORD_LENGTH = 4;

export const TEXT_RECOMMENDATIONS = {
  reversals: 'Visual processing exercises may help with letter/word reversals',
  phoneticSpellings: 'Structured spelling practice recommended',
  shortWords: 'Encourage reading materials with varied vocabulary',
} as const;

export function createTextAnalyzer(indicators: IndicatorConfig): TextAnalyzer {
  const letterPairs = parsePairs(indicators.letterReversals);
  const wordPairs = parsePairs(indicators.wordReversals);
  const phoneticPairs = parsePairs(indicators.phoneticSpellings);

  return {
    modality: 'text',

    analyze(input: TextAnalysisInput): Promise<ModalityAnalysis> {
      const text = sanitizeText(input.text);
      const words = tokenize(text);

      if (words.length === 0) {
        return Promise.reject(new ModalityAnalysisError('Empty text input'));
      }

      const totalLetters = words.reduce((sum, word) => sum + word.length, 0);
      const averageWordLength = totalLetters / words.length;
      const complexWordCount = words.filter((word) => word.length > COMPLEX_WORD_LENGTH).length;
      const sentenceCount = (text.match(/[.!?]/g) ?? []).length;

      const reversals = [
        ...detectWordReversals(words, wordPairs),
        ...detectLetterReversals(words, letterPairs),
      ];
      const phoneticSpellings = detectPhoneticSpellings(words, phoneticPairs);

      const indicatorCount = reversals.length + phoneticSpellings.length;
      const confidence = Math.min(MAX_CONFIDENCE, BASE_CONFIDENCE + indicatorCount * CONFIDENCE_PER_INDICATOR);

      const recommendations: string[] = [];
      if (reversals.length > 0) {
        recommendations.push(TEXT_RECOMMENDATIONS.reversals);
      }
      if (phoneticSpellings.length > 0) {
        recommendations.push(TEXT_RECOMMENDATIONS.phoneticSpellings);
      }
      if (averageWordLength < SHORT_AVERAGE_WORD_LENGTH) {
        recommendations.push(TEXT_RECOMMENDATIONS.shortWords);
      }

      log.debug({ wordCount: words.length, indicatorCount }, 'Text analysis complete');

      return Promise.resolve({
        confidence,
        recommendations,
        details: {
          wordCount: words.length,
          sentenceCount,
          averageWordLength: Math.round(averageWordLength * 100) / 100,
          complexWordCount,
          reversals,
          phoneticSpellings,
        },
      });
    },
  };
}

import { ModalityAnalysisError } from '@lexiscreen/shared/src/utils/errors.js';
import { createChildLogger } from '@lexiscreen/shared/src/logger.js';
import type { AnalyzeOptions } from '../types.js';
import { hashCode, pickBySeed } from '../mock-seed.js';

const log = createChildLogger('ingestion:ocr');

export interface OcrResult {
  readonly text: string;
  /** Recognition confidence in [0, 1]; doubles as a writing-clarity signal. */
  readonly confidence: number;
}

export interface OcrClient {
  extractText(imagePath: string, options?: AnalyzeOptions): Promise<OcrResult>;
}

const MOCK_SAMPLES = [
  'The quick brown fox jumps over the lazy dog',
  'Once upon a time there was a brave knight',
  'Reading is fun and helps us learn new things',
  'Practice makes perfect with daily effort',
  'The bad dad was on the saw',
] as const;

export function createMockOcrClient(): OcrClient {
  log.info('Using mock OCR client');

  return {
    async extractText(imagePath: string, options?: AnalyzeOptions): Promise<OcrResult> {
      options?.signal?.throwIfAborted();
      const text = pickBySeed(MOCK_SAMPLES, imagePath);
      const confidence = 0.6 + (Math.abs(hashCode(imagePath)) % 36) / 100;
      return { text, confidence };
    },
  };
}

export function createUnconfiguredOcrClient(): OcrClient {
  return {
    extractText(imagePath: string): Promise<OcrResult> {
      log.warn({ imagePath }, 'OCR requested but no OCR backend is configured');
      return Promise.reject(new ModalityAnalysisError('No OCR backend configured'));
    },
  };
}

import type { ModalityAnalysis } from '@lexiscreen/shared/src/types/screening.types.js';
import type { IndicatorConfig } from '@lexiscreen/schemas/src/screening-config.schema.js';
import { createChildLogger } from '@lexiscreen/shared/src/logger.js';
import { ModalityAnalysisError, toError } from '@lexiscreen/shared/src/utils/errors.js';
import type { AnalyzeOptions, HandwritingAnalysisInput, HandwritingAnalyzer } from '../types.js';
import type { OcrClient, OcrResult } from './ocr-client.js';
import { assertSupportedMedia } from '../media-path.js';
import { tokenize } from '../text/tokenize.js';
import { detectLetterReversals, detectWordReversals, parsePairs } from '../text/indicators.js';

const log = createChildLogger('ingestion:handwriting');

const CONFIDENCE_WITH_REVERSALS = 0.7;
const CONFIDENCE_WITHOUT_REVERSALS = 0.3;
const MIN_CLARITY = 0.7;

export const HANDWRITING_RECOMMENDATIONS = {
  letterFormation: 'Practice letter formation exercises',
  multiSensory: 'Use multi-sensory writing techniques',
  clarity: 'Work on handwriting clarity and spacing',
} as const;

export interface HandwritingAnalyzerDeps {
  readonly ocrClient: OcrClient;
  readonly indicators: IndicatorConfig;
  readonly imageExtensions: readonly string[];
}

export function createHandwritingAnalyzer(deps: HandwritingAnalyzerDeps): HandwritingAnalyzer {
  const letterPairs = parsePairs(deps.indicators.letterReversals);
  const wordPairs = parsePairs(deps.indicators.wordReversals);

  async function recognize(imagePath: string, options?: AnalyzeOptions): Promise<OcrResult> {
    try {
      return await deps.ocrClient.extractText(imagePath, options);
    } catch (error) {
      if (error instanceof ModalityAnalysisError) {
        throw error;
      }
      const cause = toError(error);
      throw new ModalityAnalysisError(`Handwriting analysis failed: ${cause.message}`, cause);
    }
  }

  return {
    modality: 'handwriting',

    async analyze(input: HandwritingAnalysisInput, options?: AnalyzeOptions): Promise<ModalityAnalysis> {
      assertSupportedMedia(input.imagePath, 'image', deps.imageExtensions);
      log.info({ imagePath: input.imagePath }, 'Processing handwriting image');

      const ocr = await recognize(input.imagePath, options);
      const words = tokenize(ocr.text);
      const reversals = [
        ...detectWordReversals(words, wordPairs),
        ...detectLetterReversals(words, letterPairs),
      ];

      const recommendations: string[] = [];
      if (reversals.length > 0) {
        recommendations.push(
          HANDWRITING_RECOMMENDATIONS.letterFormation,
          HANDWRITING_RECOMMENDATIONS.multiSensory,
        );
      }
      if (ocr.confidence < MIN_CLARITY) {
        recommendations.push(HANDWRITING_RECOMMENDATIONS.clarity);
      }

      return {
        confidence: reversals.length > 0 ? CONFIDENCE_WITH_REVERSALS : CONFIDENCE_WITHOUT_REVERSALS,
        recommendations,
        details: {
          extractedText: ocr.text,
          textConfidence: Math.round(ocr.confidence * 1000) / 1000,
          reversals,
        },
      };
    },
  };
}

import type { ScreeningConfig } from '@lexiscreen/schemas/src/screening-config.schema.js';
import type { ModelClients } from '@lexiscreen/ingestion/src/model-clients.js';
import { createTextAnalyzer } from '@lexiscreen/ingestion/src/text/analyzer.js';
import { createHandwritingAnalyzer } from '@lexiscreen/ingestion/src/image/analyzer.js';
import { createSpeechAnalyzer } from '@lexiscreen/ingestion/src/audio/analyzer.js';
import type { ScreeningAnalyzers } from './screening-pipeline.js';

export function createScreeningAnalyzers(
  config: Pick<ScreeningConfig, 'indicators' | 'media'>,
  clients: ModelClients,
): ScreeningAnalyzers {
  return {
    text: createTextAnalyzer(config.indicators),
    handwriting: createHandwritingAnalyzer({
      ocrClient: clients.ocrClient,
      indicators: config.indicators,
      imageExtensions: config.media.imageExtensions,
    }),
    speech: createSpeechAnalyzer({
      transcriptionClient: clients.transcriptionClient,
      audioExtensions: config.media.audioExtensions,
    }),
  };
}

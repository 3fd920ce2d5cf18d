import type { OcrClient } from './image/ocr-client.js';
import { createMockOcrClient, createUnconfiguredOcrClient } from './image/ocr-client.js';
import type { TranscriptionClient } from './audio/transcription-client.js';
import {
  createMockTranscriptionClient,
  createUnconfiguredTranscriptionClient,
} from './audio/transcription-client.js';

export interface ModelClients {
  readonly ocrClient: OcrClient;
  readonly transcriptionClient: TranscriptionClient;
}

export interface ModelClientOptions {
  /** Deterministic stand-ins instead of real model backends. */
  readonly useMocks: boolean;
}

export function createModelClients(options: ModelClientOptions): ModelClients {
  if (options.useMocks) {
    return {
      ocrClient: createMockOcrClient(),
      transcriptionClient: createMockTranscriptionClient(),
    };
  }

  return {
    ocrClient: createUnconfiguredOcrClient(),
    transcriptionClient: createUnconfiguredTranscriptionClient(),
  };
}

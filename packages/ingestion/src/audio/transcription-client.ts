import { ModalityAnalysisError } from '@lexiscreen/shared/src/utils/errors.js';
import { createChildLogger } from '@lexiscreen/shared/src/logger.js';
import type { AnalyzeOptions } from '../types.js';
import { hashCode, pickBySeed } from '../mock-seed.js';

const log = createChildLogger('ingestion:transcription');

export interface TranscriptSegment {
  readonly text: string;
  readonly startSeconds: number;
  readonly endSeconds: number;
}

export interface TranscriptionResult {
  readonly text: string;
  readonly durationSeconds: number;
  readonly confidence: number;
  readonly segments: readonly TranscriptSegment[];
}

export interface TranscriptionClient {
  transcribe(audioPath: string, options?: AnalyzeOptions): Promise<TranscriptionResult>;
}

const MOCK_TRANSCRIPTS = [
  'the cat sat on the mat and looked out of the window',
  'once upon a time um there was a little house by the river',
  'she went to the shop to buy some bread and milk for breakfast',
  'the sun was uh shining and the birds were singing in the trees',
] as const;

const MOCK_WORDS_PER_SEGMENT = 4;
const MOCK_SECONDS_PER_WORD = 0.45;
const MOCK_SEGMENT_GAP_SECONDS = 0.2;

function toSegments(text: string): TranscriptSegment[] {
  const words = text.split(' ');
  const segments: TranscriptSegment[] = [];
  let cursor = 0;

  for (let i = 0; i < words.length; i += MOCK_WORDS_PER_SEGMENT) {
    const chunk = words.slice(i, i + MOCK_WORDS_PER_SEGMENT);
    const start = cursor;
    const end = start + chunk.length * MOCK_SECONDS_PER_WORD;
    segments.push({ text: chunk.join(' '), startSeconds: start, endSeconds: end });
    cursor = end + MOCK_SEGMENT_GAP_SECONDS;
  }

  return segments;
}

export function createMockTranscriptionClient(): TranscriptionClient {
  log.info('Using mock transcription client');

  return {
    async transcribe(audioPath: string, options?: AnalyzeOptions): Promise<TranscriptionResult> {
      options?.signal?.throwIfAborted();
      const text = pickBySeed(MOCK_TRANSCRIPTS, audioPath);
      const segments = toSegments(text);
      const last = segments[segments.length - 1];

      return {
        text,
        durationSeconds: last ? last.endSeconds : 0,
        confidence: 0.8 + (Math.abs(hashCode(audioPath)) % 16) / 100,
        segments,
      };
    },
  };
}

export function createUnconfiguredTranscriptionClient(): TranscriptionClient {
  return {
    transcribe(audioPath: string): Promise<TranscriptionResult> {
      log.warn({ audioPath }, 'Transcription requested but no speech backend is configured');
      return Promise.reject(new ModalityAnalysisError('No transcription backend configured'));
    },
  };
}

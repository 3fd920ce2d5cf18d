import type { ModalityAnalysis } from '@lexiscreen/shared/src/types/screening.types.js';
import { createChildLogger } from '@lexiscreen/shared/src/logger.js';
import { ModalityAnalysisError, toError } from '@lexiscreen/shared/src/utils/errors.js';
import { clamp, longestCommonSubsequenceLength } from '@lexiscreen/shared/src/utils/math.js';
import type { AnalyzeOptions, SpeechAnalysisInput, SpeechAnalyzer } from '../types.js';
import type { TranscriptSegment, TranscriptionClient, TranscriptionResult } from './transcription-client.js';
import { assertSupportedMedia } from '../media-path.js';
import { sanitizeText, tokenize } from '../text/tokenize.js';

const log = createChildLogger('ingestion:speech');

const FILLER_WORDS: ReadonlySet<string> = new Set(['um', 'uh', 'er', 'erm', 'hmm']);
const PAUSE_THRESHOLD_SECONDS = 1;
const MIN_FLUENT_WPM = 100;
const MAX_FLUENT_WPM = 200;
const SLOW_OR_FAST_SPEED_FACTOR = 0.7;
const MIN_ACCURACY = 0.85;
const MAX_PAUSES = 3;
const MAX_HESITATIONS = 2;
const MAX_CONFIDENCE = 0.9;

export const SPEECH_RECOMMENDATIONS = {
  fluency: 'Practice reading fluency exercises daily',
  wordRecognition: 'Work on word recognition and pronunciation',
  continuousReading: 'Practice smooth, continuous reading',
  repeatedReading: 'Build confidence through repeated reading of familiar texts',
} as const;

export interface SpeechAnalyzerDeps {
  readonly transcriptionClient: TranscriptionClient;
  readonly audioExtensions: readonly string[];
}

interface AccuracyMeasure {
  readonly accuracy: number;
  readonly mispronunciations: number;
}

export function countPauses(segments: readonly TranscriptSegment[]): number {
  let pauses = 0;
  for (let i = 1; i < segments.length; i++) {
    if (segments[i].startSeconds - segments[i - 1].endSeconds >= PAUSE_THRESHOLD_SECONDS) {
      pauses++;
    }
  }
  return pauses;
}

function measureAccuracy(
  spoken: readonly string[],
  transcriptionConfidence: number,
  expectedText: string | undefined,
): AccuracyMeasure {
  const expected = expectedText === undefined ? [] : tokenize(sanitizeText(expectedText));
  if (expected.length === 0) {
    return { accuracy: clamp(transcriptionConfidence, 0, 1), mispronunciations: 0 };
  }

  const matched = longestCommonSubsequenceLength(expected, spoken);
  return {
    accuracy: matched / expected.length,
    mispronunciations: expected.length - matched,
  };
}

export function createSpeechAnalyzer(deps: SpeechAnalyzerDeps): SpeechAnalyzer {
  async function transcribe(audioPath: string, options?: AnalyzeOptions): Promise<TranscriptionResult> {
    try {
      return await deps.transcriptionClient.transcribe(audioPath, options);
    } catch (error) {
      if (error instanceof ModalityAnalysisError) {
        throw error;
      }
      const cause = toError(error);
      throw new ModalityAnalysisError(`Speech analysis failed: ${cause.message}`, cause);
    }
  }

  return {
    modality: 'speech',

    async analyze(input: SpeechAnalysisInput, options?: AnalyzeOptions): Promise<ModalityAnalysis> {
      assertSupportedMedia(input.audioPath, 'audio', deps.audioExtensions);
      log.info({ audioPath: input.audioPath }, 'Processing speech recording');

      const transcript = await transcribe(input.audioPath, options);
      if (transcript.durationSeconds <= 0) {
        throw new ModalityAnalysisError('Audio recording has no duration');
      }

      const tokens = tokenize(transcript.text);
      const spoken = tokens.filter((token) => !FILLER_WORDS.has(token));
      const hesitations = tokens.length - spoken.length;
      const pauses = countPauses(transcript.segments);
      const wpm = spoken.length / (transcript.durationSeconds / 60);
      const { accuracy, mispronunciations } = measureAccuracy(
        spoken,
        transcript.confidence,
        input.expectedText,
      );

      const speedFactor =
        wpm >= MIN_FLUENT_WPM && wpm <= MAX_FLUENT_WPM ? 1 : SLOW_OR_FAST_SPEED_FACTOR;
      const issues = pauses + hesitations + mispronunciations;
      const confidence = Math.min(
        MAX_CONFIDENCE,
        issues * 0.1 + (1 - speedFactor) * 0.3 + (1 - accuracy) * 0.4,
      );

      const recommendations: string[] = [];
      if (wpm < MIN_FLUENT_WPM) recommendations.push(SPEECH_RECOMMENDATIONS.fluency);
      if (accuracy < MIN_ACCURACY) recommendations.push(SPEECH_RECOMMENDATIONS.wordRecognition);
      if (pauses > MAX_PAUSES) recommendations.push(SPEECH_RECOMMENDATIONS.continuousReading);
      if (hesitations > MAX_HESITATIONS) recommendations.push(SPEECH_RECOMMENDATIONS.repeatedReading);

      log.debug({ wpm, accuracy, pauses, hesitations }, 'Speech metrics computed');

      return {
        confidence,
        recommendations,
        details: {
          transcribedText: transcript.text,
          audioDurationSeconds: Math.round(transcript.durationSeconds * 100) / 100,
          readingSpeedWpm: Math.round(wpm * 10) / 10,
          accuracyScore: Math.round(accuracy * 1000) / 1000,
          pauseCount: pauses,
          hesitationCount: hesitations,
          mispronunciationCount: mispronunciations,
        },
      };
    },
  };
}

import type { ModalityAnalysis, ScreeningModality } from '@lexiscreen/shared/src/types/screening.types.js';

export interface AnalyzeOptions {
  readonly signal?: AbortSignal;
}

/**
 * One modality's analysis stage. Implementations may call out to model
 * backends; the pipeline treats them as opaque and replaceable.
 */
export interface ModalityAnalyzer<TInput> {
  readonly modality: ScreeningModality;
  analyze(input: TInput, options?: AnalyzeOptions): Promise<ModalityAnalysis>;
}

export interface TextAnalysisInput {
  readonly text: string;
}

export interface HandwritingAnalysisInput {
  readonly imagePath: string;
}

export interface SpeechAnalysisInput {
  readonly audioPath: string;
  /** Passage the reader was asked to read aloud, when known. */
  readonly expectedText?: string;
}

export type TextAnalyzer = ModalityAnalyzer<TextAnalysisInput>;
export type HandwritingAnalyzer = ModalityAnalyzer<HandwritingAnalysisInput>;
export type SpeechAnalyzer = ModalityAnalyzer<SpeechAnalysisInput>;

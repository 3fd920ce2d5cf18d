import type {
  AggregateResult,
  ModalityAnalysis,
  ModalityResult,
  ScreeningInput,
  ScreeningModality,
} from '@lexiscreen/shared/src/types/screening.types.js';
import { MODALITY_ORDER } from '@lexiscreen/shared/src/types/screening.types.js';
import type { ScreeningConfig } from '@lexiscreen/schemas/src/screening-config.schema.js';
import { DEFAULT_SCREENING_CONFIG } from '@lexiscreen/schemas/src/screening-config.schema.js';
import { validateModalityAnalysis } from '@lexiscreen/schemas/src/validators.js';
import type {
  HandwritingAnalyzer,
  SpeechAnalyzer,
  TextAnalyzer,
} from '@lexiscreen/ingestion/src/types.js';
import { createChildLogger } from '@lexiscreen/shared/src/logger.js';
import { NoInputProvidedError, toError } from '@lexiscreen/shared/src/utils/errors.js';
import { clamp } from '@lexiscreen/shared/src/utils/math.js';
import { withTimeout } from '@lexiscreen/shared/src/utils/timeout.js';
import { aggregateConfidence } from '../screening/confidence-aggregator.js';
import { mergeRecommendations } from '../screening/recommendation-merger.js';
import { classifyRisk } from '../screening/risk-classifier.js';
import { determineAnalysisType, formatScreeningSummary } from '../screening/summary-formatter.js';

const log = createChildLogger('orchestration:screening-pipeline');

export interface ScreeningAnalyzers {
  readonly text: TextAnalyzer;
  readonly handwriting: HandwritingAnalyzer;
  readonly speech: SpeechAnalyzer;
}

export type ScreeningPipelineConfig = Pick<
  ScreeningConfig,
  'thresholds' | 'variancePenalty' | 'neutralConfidence' | 'modalityTimeoutMs'
>;

export interface ScreeningPipeline {
  analyze(input: ScreeningInput): Promise<AggregateResult>;
}

interface ModalityTask {
  readonly modality: ScreeningModality;
  run(signal: AbortSignal): Promise<ModalityAnalysis>;
}

function isPresent(value: string | undefined): value is string {
  return value !== undefined && value.trim().length > 0;
}

function planTasks(input: ScreeningInput, analyzers: ScreeningAnalyzers): ModalityTask[] {
  const tasks: ModalityTask[] = [];
  const { text, imagePath, audioPath } = input;

  if (isPresent(text)) {
    tasks.push({ modality: 'text', run: (signal) => analyzers.text.analyze({ text }, { signal }) });
  }
  if (isPresent(imagePath)) {
    tasks.push({
      modality: 'handwriting',
      run: (signal) => analyzers.handwriting.analyze({ imagePath }, { signal }),
    });
  }
  if (isPresent(audioPath)) {
    // The typed text doubles as the passage the reader was asked to read aloud.
    tasks.push({
      modality: 'speech',
      run: (signal) =>
        analyzers.speech.analyze(
          { audioPath, ...(isPresent(text) && { expectedText: text }) },
          { signal },
        ),
    });
  }

  return tasks;
}

export function createScreeningPipeline(
  analyzers: ScreeningAnalyzers,
  config: ScreeningPipelineConfig = DEFAULT_SCREENING_CONFIG,
): ScreeningPipeline {
  const aggregationOptions = {
    penaltyFactor: config.variancePenalty.factor,
    penaltyCap: config.variancePenalty.cap,
    neutral: config.neutralConfidence,
  };

  function failedResult(modality: ScreeningModality, error: Error): ModalityResult {
    return Object.freeze({
      modality,
      confidence: config.neutralConfidence,
      recommendations: Object.freeze([]),
      error: error.message,
      details: Object.freeze({}),
    });
  }

  async function runTask(task: ModalityTask): Promise<ModalityResult> {
    try {
      const raw = await withTimeout(`${task.modality} analysis`, config.modalityTimeoutMs, (signal) =>
        task.run(signal),
      );
      const analysis = validateModalityAnalysis(raw, task.modality);
      const confidence = clamp(analysis.confidence, 0, 1);
      if (confidence !== analysis.confidence) {
        log.debug(
          { modality: task.modality, reported: analysis.confidence, clamped: confidence },
          'Clamped out-of-range analyzer confidence',
        );
      }

      return Object.freeze({
        modality: task.modality,
        confidence,
        recommendations: Object.freeze([...analysis.recommendations]),
        details: Object.freeze(analysis.details),
      });
    } catch (error) {
      const err = toError(error);
      log.warn({ modality: task.modality, err: err.message }, 'Modality analysis failed');
      return failedResult(task.modality, err);
    }
  }

  return {
    async analyze(input: ScreeningInput): Promise<AggregateResult> {
      const tasks = planTasks(input, analyzers);
      if (tasks.length === 0) {
        throw new NoInputProvidedError();
      }

      log.info({ modalities: tasks.map((t) => t.modality) }, 'Running screening');

      const settled = new Map<ScreeningModality, ModalityResult>();
      await Promise.all(
        tasks.map(async (task) => {
          settled.set(task.modality, await runTask(task));
        }),
      );

      const modalityResults = MODALITY_ORDER.flatMap((modality) => {
        const result = settled.get(modality);
        return result ? [result] : [];
      });
      const modalities = modalityResults.map((r) => r.modality);

      const overallConfidence = aggregateConfidence(
        modalityResults.map((r) => r.confidence),
        aggregationOptions,
      );
      const riskLevel = classifyRisk(overallConfidence, config.thresholds);
      const recommendations = mergeRecommendations(
        modalityResults.map((r) => r.recommendations),
        overallConfidence,
        config.thresholds,
      );

      log.info(
        {
          modalities,
          failed: modalityResults.filter((r) => r.error !== undefined).length,
          overallConfidence,
          riskLevel,
        },
        'Screening complete',
      );

      return Object.freeze({
        analysisType: determineAnalysisType(modalities),
        overallConfidence,
        riskLevel,
        recommendations: Object.freeze(recommendations),
        screeningSummary: formatScreeningSummary(modalities, riskLevel, overallConfidence),
        modalityResults: Object.freeze(modalityResults),
      });
    },
  };
}

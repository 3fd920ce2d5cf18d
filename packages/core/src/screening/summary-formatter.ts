import type {
  AnalysisType,
  ModalityResult,
  RiskLevel,
  ScreeningModality,
} from '@lexiscreen/shared/src/types/screening.types.js';
import { MODALITY_ORDER } from '@lexiscreen/shared/src/types/screening.types.js';

function inCanonicalOrder(modalities: Iterable<ScreeningModality>): ScreeningModality[] {
  const used = new Set(modalities);
  return MODALITY_ORDER.filter((modality) => used.has(modality));
}

export function formatScreeningSummary(
  modalitiesUsed: Iterable<ScreeningModality>,
  riskLevel: RiskLevel,
  confidence: number,
): string {
  const modalities = inCanonicalOrder(modalitiesUsed);
  const source =
    modalities.length > 0
      ? `using ${modalities.join(', ')} analysis`
      : 'without any analyzed input';

  return (
    `Dyslexia screening conducted ${source}. ` +
    `Risk level assessed as ${riskLevel.toLowerCase()} based on detected patterns and indicators. ` +
    `Confidence score: ${confidence.toFixed(2)}`
  );
}

export function determineAnalysisType(modalitiesUsed: Iterable<ScreeningModality>): AnalysisType {
  const modalities = inCanonicalOrder(modalitiesUsed);
  if (modalities.length === 1) {
    return modalities[0];
  }
  return 'multimodal';
}

/** One-line status for a modality; an empty error message still counts as a failure. */
export function formatModalityStatus(result: ModalityResult): string {
  const status = result.error !== undefined ? `failed: ${result.error}` : 'ok';
  return `${result.modality}: confidence ${result.confidence.toFixed(2)} (${status})`;
}

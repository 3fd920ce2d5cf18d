import { z } from 'zod';

/**
 * Shape every analyzer must return. Confidence must be a finite number but is
 * not range-checked here: out-of-range values are clamped by the pipeline.
 */
export const ModalityAnalysisSchema = z.object({
  confidence: z.number().finite(),
  recommendations: z.array(z.string()),
  details: z.record(z.unknown()).default({}),
});

export type ValidatedModalityAnalysis = z.infer<typeof ModalityAnalysisSchema>;

import type { ZodError } from 'zod';
import { SchemaValidationError } from '@lexiscreen/shared/src/utils/errors.js';
import { ScreeningConfigSchema } from './screening-config.schema.js';
import type { ScreeningConfig } from './screening-config.schema.js';
import { ModalityAnalysisSchema } from './modality-analysis.schema.js';
import type { ValidatedModalityAnalysis } from './modality-analysis.schema.js';

export function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function validateScreeningConfig(data: unknown): ScreeningConfig {
  const result = ScreeningConfigSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid screening configuration', formatZodErrors(result.error));
  }

  return result.data;
}

export function validateModalityAnalysis(data: unknown, analyzerName: string): ValidatedModalityAnalysis {
  const result = ModalityAnalysisSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError(
      `${analyzerName} analyzer returned invalid output`,
      formatZodErrors(result.error),
    );
  }

  return result.data;
}

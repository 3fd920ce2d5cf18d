import { z } from 'zod';

const ReversalPairSchema = z
  .string()
  .regex(/^[^/\s]+\/[^/\s]+$/, 'Expected a pair written as "first/second"');

const RiskThresholdsSchema = z
  .object({
    high: z.number().min(0).max(1).default(0.8),
    medium: z.number().min(0).max(1).default(0.6),
  })
  .refine((t) => t.medium < t.high, {
    message: 'medium threshold must be below high threshold',
    path: ['medium'],
  });

const VariancePenaltySchema = z.object({
  factor: z.number().min(0).default(0.5),
  cap: z.number().min(0).max(1).default(0.3),
});

const IndicatorsSchema = z.object({
  letterReversals: z.array(ReversalPairSchema).default(['b/d', 'p/q', 'u/n', 'm/w']),
  wordReversals: z.array(ReversalPairSchema).default(['was/saw', 'on/no', 'left/felt']),
  phoneticSpellings: z.array(ReversalPairSchema).default(['phone/fone', 'enough/enuf']),
});

// Largest delay setTimeout honours; larger values fire after 1 ms.
const MAX_TIMER_DELAY_MS = 2_147_483_647;

const ExtensionSchema = z.string().regex(/^\.[a-z0-9]+$/, 'Expected a lowercase extension such as ".png"');

const MediaSchema = z.object({
  imageExtensions: z
    .array(ExtensionSchema)
    .min(1)
    .default(['.jpg', '.jpeg', '.png', '.bmp', '.tiff', '.webp']),
  audioExtensions: z.array(ExtensionSchema).min(1).default(['.wav', '.mp3', '.flac', '.ogg', '.m4a']),
});

export const ScreeningConfigSchema = z.object({
  $schema: z.string().optional(),
  thresholds: RiskThresholdsSchema.default({}),
  variancePenalty: VariancePenaltySchema.default({}),
  neutralConfidence: z.number().min(0).max(1).default(0.5),
  modalityTimeoutMs: z.number().int().positive().max(MAX_TIMER_DELAY_MS).default(30_000),
  indicators: IndicatorsSchema.default({}),
  media: MediaSchema.default({}),
});

export type ScreeningConfig = z.infer<typeof ScreeningConfigSchema>;
export type IndicatorConfig = z.infer<typeof IndicatorsSchema>;
export type MediaConfig = z.infer<typeof MediaSchema>;
export type VariancePenaltyConfig = z.infer<typeof VariancePenaltySchema>;

export const DEFAULT_SCREENING_CONFIG: ScreeningConfig = ScreeningConfigSchema.parse({});

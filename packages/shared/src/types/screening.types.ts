export type ScreeningModality = 'text' | 'handwriting' | 'speech';

/** Evaluation and merge order; recommendation lists are concatenated in this order. */
export const MODALITY_ORDER: readonly ScreeningModality[] = ['text', 'handwriting', 'speech'];

export type AnalysisType = ScreeningModality | 'multimodal';

export type RiskLevel = 'Low' | 'Moderate' | 'High';

export const RISK_LEVELS: readonly RiskLevel[] = ['Low', 'Moderate', 'High'];

export type ModalityDetails = Readonly<Record<string, unknown>>;

/** What an analyzer hands back for one modality. */
export interface ModalityAnalysis {
  readonly confidence: number;
  readonly recommendations: readonly string[];
  readonly details: ModalityDetails;
}

export interface ModalityResult extends ModalityAnalysis {
  readonly modality: ScreeningModality;
  readonly error?: string;
}

export interface ScreeningInput {
  readonly text?: string;
  readonly audioPath?: string;
  readonly imagePath?: string;
}

export interface RiskThresholds {
  readonly high: number;
  readonly medium: number;
}

export interface AggregateResult {
  readonly analysisType: AnalysisType;
  readonly overallConfidence: number;
  readonly riskLevel: RiskLevel;
  readonly recommendations: readonly string[];
  readonly screeningSummary: string;
  readonly modalityResults: readonly ModalityResult[];
}

export type SessionSource = 'cli' | 'api' | 'web';

export interface ScreeningSession {
  readonly id: string;
  readonly input: ScreeningInput;
  readonly result: AggregateResult;
  readonly processingTimeMs: number;
  readonly userId?: string;
  readonly source?: SessionSource;
  readonly createdAt: Date;
}

export interface ScreeningStatistics {
  readonly totalSessions: number;
  readonly averageConfidence: number;
  readonly sessionsToday: number;
  readonly riskLevelCounts: Readonly<Record<RiskLevel, number>>;
}

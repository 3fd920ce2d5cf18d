import type {
  AggregateResult,
  RiskLevel,
  ScreeningInput,
  ScreeningSession,
  SessionSource,
} from '@lexiscreen/shared/src/types/screening.types.js';

export interface CreateScreeningSessionInput {
  readonly input: ScreeningInput;
  readonly result: AggregateResult;
  readonly processingTimeMs: number;
  readonly userId?: string;
  readonly source?: SessionSource;
  /** Defaults to the time of the call. */
  readonly createdAt?: Date;
}

export interface ListScreeningSessionsInput {
  readonly limit?: number;
  readonly userId?: string;
}

export interface ScreeningSessionSummary {
  readonly totalSessions: number;
  /** Mean overall confidence, 0 when there are no sessions. */
  readonly averageConfidence: number;
  readonly sessionsSince: number;
  readonly riskLevelCounts: Readonly<Record<RiskLevel, number>>;
}

export interface ScreeningSessionRepository {
  create(input: CreateScreeningSessionInput): Promise<ScreeningSession>;
  getById(id: string): Promise<ScreeningSession | null>;
  /** Newest first. */
  list(input?: ListScreeningSessionsInput): Promise<readonly ScreeningSession[]>;
  summarize(since: Date): Promise<ScreeningSessionSummary>;
  /** Returns the number of sessions removed. */
  deleteAll(): Promise<number>;
}

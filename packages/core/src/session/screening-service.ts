import type {
  ScreeningInput,
  ScreeningSession,
  ScreeningStatistics,
  SessionSource,
} from '@lexiscreen/shared/src/types/screening.types.js';
import { SessionError } from '@lexiscreen/shared/src/utils/errors.js';
import { createChildLogger } from '@lexiscreen/shared/src/logger.js';
import { clamp } from '@lexiscreen/shared/src/utils/math.js';
import type { ScreeningPipeline } from '../orchestration/screening-pipeline.js';
import type { ScreeningSessionRepository } from '../repositories/screening-session.repository.js';

const log = createChildLogger('session:screening-service');

const DEFAULT_LIST_LIMIT = 50;
const MAX_LIST_LIMIT = 100;

export interface ScreeningServiceConfig {
  readonly pipeline: ScreeningPipeline;
  readonly sessionRepository: ScreeningSessionRepository;
}

export interface ScreeningRequest extends ScreeningInput {
  readonly userId?: string;
  readonly source?: SessionSource;
}

export interface ListSessionsOptions {
  readonly limit?: number;
  readonly userId?: string;
}

export interface ClearSessionsOptions {
  readonly confirm: boolean;
}

export interface ScreeningService {
  screen(request: ScreeningRequest): Promise<ScreeningSession>;
  getSession(sessionId: string): Promise<ScreeningSession>;
  listSessions(options?: ListSessionsOptions): Promise<readonly ScreeningSession[]>;
  getStatistics(now?: Date): Promise<ScreeningStatistics>;
  clearSessions(options: ClearSessionsOptions): Promise<number>;
}

function startOfLocalDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

function recordedInput(request: ScreeningRequest): ScreeningInput {
  return {
    ...(request.text !== undefined && { text: request.text }),
    ...(request.audioPath !== undefined && { audioPath: request.audioPath }),
    ...(request.imagePath !== undefined && { imagePath: request.imagePath }),
  };
}

export function createScreeningService(config: ScreeningServiceConfig): ScreeningService {
  const { pipeline, sessionRepository } = config;

  return {
    async screen(request: ScreeningRequest): Promise<ScreeningSession> {
      const startedAt = performance.now();
      const input = recordedInput(request);
      const result = await pipeline.analyze(input);
      const processingTimeMs = Math.round(performance.now() - startedAt);

      const session = await sessionRepository.create({
        input,
        result,
        processingTimeMs,
        ...(request.userId !== undefined && { userId: request.userId }),
        ...(request.source !== undefined && { source: request.source }),
      });

      log.info(
        { sessionId: session.id, riskLevel: result.riskLevel, processingTimeMs },
        'Screening session recorded',
      );
      return session;
    },

    async getSession(sessionId: string): Promise<ScreeningSession> {
      const session = await sessionRepository.getById(sessionId);
      if (!session) {
        throw new SessionError(`Screening session not found: ${sessionId}`);
      }
      return session;
    },

    async listSessions(options?: ListSessionsOptions): Promise<readonly ScreeningSession[]> {
      const requested = options?.limit;
      const limit =
        requested !== undefined && Number.isFinite(requested)
          ? clamp(Math.trunc(requested), 1, MAX_LIST_LIMIT)
          : DEFAULT_LIST_LIMIT;
      return sessionRepository.list({
        limit,
        ...(options?.userId !== undefined && { userId: options.userId }),
      });
    },

    async getStatistics(now: Date = new Date()): Promise<ScreeningStatistics> {
      const summary = await sessionRepository.summarize(startOfLocalDay(now));
      return {
        totalSessions: summary.totalSessions,
        averageConfidence: summary.averageConfidence,
        sessionsToday: summary.sessionsSince,
        riskLevelCounts: summary.riskLevelCounts,
      };
    },

    async clearSessions(options: ClearSessionsOptions): Promise<number> {
      if (!options.confirm) {
        throw new SessionError('Refusing to clear screening sessions without confirmation');
      }
      const deleted = await sessionRepository.deleteAll();
      log.warn({ deleted }, 'All screening sessions cleared');
      return deleted;
    },
  };
}

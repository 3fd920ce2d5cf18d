import { randomUUID } from 'node:crypto';
import type { RiskLevel, ScreeningSession } from '@lexiscreen/shared/src/types/screening.types.js';
import { mean } from '@lexiscreen/shared/src/utils/math.js';
import type {
  CreateScreeningSessionInput,
  ListScreeningSessionsInput,
  ScreeningSessionRepository,
  ScreeningSessionSummary,
} from './screening-session.repository.js';

const DEFAULT_LIST_LIMIT = 50;

interface StoredSession {
  readonly sequence: number;
  readonly session: ScreeningSession;
}

export function createInMemoryScreeningSessionRepository(): ScreeningSessionRepository {
  const sessions = new Map<string, StoredSession>();
  let sequence = 0;

  function newestFirst(a: StoredSession, b: StoredSession): number {
    return (
      b.session.createdAt.getTime() - a.session.createdAt.getTime() || b.sequence - a.sequence
    );
  }

  return {
    create(input: CreateScreeningSessionInput): Promise<ScreeningSession> {
      const session: ScreeningSession = {
        id: randomUUID(),
        input: input.input,
        result: input.result,
        processingTimeMs: input.processingTimeMs,
        ...(input.userId !== undefined && { userId: input.userId }),
        ...(input.source !== undefined && { source: input.source }),
        createdAt: input.createdAt ?? new Date(),
      };
      sessions.set(session.id, { sequence: sequence++, session });
      return Promise.resolve(session);
    },

    getById(id: string): Promise<ScreeningSession | null> {
      return Promise.resolve(sessions.get(id)?.session ?? null);
    },

    list(input?: ListScreeningSessionsInput): Promise<readonly ScreeningSession[]> {
      let results = [...sessions.values()];
      if (input?.userId !== undefined) {
        results = results.filter((s) => s.session.userId === input.userId);
      }
      results.sort(newestFirst);
      const limit = input?.limit ?? DEFAULT_LIST_LIMIT;
      return Promise.resolve(results.slice(0, limit).map((s) => s.session));
    },

    summarize(since: Date): Promise<ScreeningSessionSummary> {
      const all = [...sessions.values()].map((s) => s.session);
      const riskLevelCounts: Record<RiskLevel, number> = { Low: 0, Moderate: 0, High: 0 };
      for (const session of all) {
        riskLevelCounts[session.result.riskLevel]++;
      }

      return Promise.resolve({
        totalSessions: all.length,
        averageConfidence: mean(all.map((s) => s.result.overallConfidence)),
        sessionsSince: all.filter((s) => s.createdAt.getTime() >= since.getTime()).length,
        riskLevelCounts,
      });
    },

    deleteAll(): Promise<number> {
      const count = sessions.size;
      sessions.clear();
      return Promise.resolve(count);
    },
  };
}

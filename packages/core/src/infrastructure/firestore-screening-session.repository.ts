import { AggregateField, Timestamp } from '@google-cloud/firestore';
import type { Query } from '@google-cloud/firestore';
import type {
  AggregateResult,
  RiskLevel,
  ScreeningInput,
  ScreeningSession,
  SessionSource,
} from '@lexiscreen/shared/src/types/screening.types.js';
import { RISK_LEVELS } from '@lexiscreen/shared/src/types/screening.types.js';
import { PersistenceError, toError } from '@lexiscreen/shared/src/utils/errors.js';
import { createChildLogger } from '@lexiscreen/shared/src/logger.js';
import type {
  CreateScreeningSessionInput,
  ListScreeningSessionsInput,
  ScreeningSessionRepository,
  ScreeningSessionSummary,
} from '../repositories/screening-session.repository.js';
import type { FirestoreBase } from './firestore-types.js';
import { getFirestoreClient } from './firestore-types.js';
import { dateToTimestamp, timestampToDate } from './firestore-converters.js';

const log = createChildLogger('persistence:screening-sessions');

const SCREENING_SESSIONS_COLLECTION = 'screeningSessions';
const DEFAULT_LIST_LIMIT = 50;

// overallConfidence and riskLevel are duplicated at the top level for aggregation queries.
interface ScreeningSessionDocument {
  input: ScreeningInput;
  result: AggregateResult;
  overallConfidence: number;
  riskLevel: RiskLevel;
  processingTimeMs: number;
  userId?: string;
  source?: SessionSource;
  createdAt: Timestamp;
}

function definedInput(input: ScreeningInput): ScreeningInput {
  return {
    ...(input.text !== undefined && { text: input.text }),
    ...(input.audioPath !== undefined && { audioPath: input.audioPath }),
    ...(input.imagePath !== undefined && { imagePath: input.imagePath }),
  };
}

function sessionFromDoc(id: string, data: ScreeningSessionDocument): ScreeningSession {
  return {
    id,
    input: data.input,
    result: data.result,
    processingTimeMs: data.processingTimeMs,
    ...(data.userId !== undefined && { userId: data.userId }),
    ...(data.source !== undefined && { source: data.source }),
    createdAt: timestampToDate(data.createdAt),
  };
}

export function createFirestoreScreeningSessionRepository(
  base: FirestoreBase,
): ScreeningSessionRepository {
  const sessionsRef = base.collection(SCREENING_SESSIONS_COLLECTION);

  async function count(query: Query): Promise<number> {
    const snapshot = await query.count().get();
    return snapshot.data().count;
  }

  return {
    async create(input: CreateScreeningSessionInput): Promise<ScreeningSession> {
      const docData: ScreeningSessionDocument = {
        input: definedInput(input.input),
        result: input.result,
        overallConfidence: input.result.overallConfidence,
        riskLevel: input.result.riskLevel,
        processingTimeMs: input.processingTimeMs,
        ...(input.userId !== undefined && { userId: input.userId }),
        ...(input.source !== undefined && { source: input.source }),
        createdAt: input.createdAt ? dateToTimestamp(input.createdAt) : Timestamp.now(),
      };

      const docRef = sessionsRef.doc();
      try {
        await docRef.set(docData);
      } catch (error) {
        throw new PersistenceError('Failed to record screening session', toError(error));
      }

      log.debug({ sessionId: docRef.id }, 'Screening session recorded');
      return sessionFromDoc(docRef.id, docData);
    },

    async getById(id: string): Promise<ScreeningSession | null> {
      const doc = await sessionsRef.doc(id).get();
      if (!doc.exists) {
        return null;
      }
      return sessionFromDoc(id, doc.data() as ScreeningSessionDocument);
    },

    async list(input?: ListScreeningSessionsInput): Promise<readonly ScreeningSession[]> {
      let query: Query = sessionsRef;
      if (input?.userId !== undefined) {
        query = query.where('userId', '==', input.userId);
      }

      const snapshot = await query
        .orderBy('createdAt', 'desc')
        .limit(input?.limit ?? DEFAULT_LIST_LIMIT)
        .get();

      return snapshot.docs.map((doc) =>
        sessionFromDoc(doc.id, doc.data() as ScreeningSessionDocument),
      );
    },

    async summarize(since: Date): Promise<ScreeningSessionSummary> {
      const [totals, sessionsSince] = await Promise.all([
        sessionsRef
          .aggregate({
            total: AggregateField.count(),
            averageConfidence: AggregateField.average('overallConfidence'),
          })
          .get(),
        count(sessionsRef.where('createdAt', '>=', dateToTimestamp(since))),
      ]);
      const levelCounts = await Promise.all(
        RISK_LEVELS.map((level) => count(sessionsRef.where('riskLevel', '==', level))),
      );

      const riskLevelCounts: Record<RiskLevel, number> = { Low: 0, Moderate: 0, High: 0 };
      RISK_LEVELS.forEach((level, i) => {
        riskLevelCounts[level] = levelCounts[i] ?? 0;
      });

      const data = totals.data();
      return {
        totalSessions: data.total,
        averageConfidence: data.averageConfidence ?? 0,
        sessionsSince,
        riskLevelCounts,
      };
    },

    async deleteAll(): Promise<number> {
      const total = await count(sessionsRef);
      try {
        await getFirestoreClient(base).recursiveDelete(sessionsRef);
      } catch (error) {
        throw new PersistenceError('Failed to delete screening sessions', toError(error));
      }
      log.info({ deleted: total }, 'Screening sessions cleared');
      return total;
    },
  };
}

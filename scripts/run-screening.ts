import { resolve } from 'node:path';
import { parseArgs } from 'node:util';
import { loadScreeningConfig } from '@lexiscreen/schemas/src/config-loader.js';
import { createModelClients } from '@lexiscreen/ingestion/src/model-clients.js';
import { createScreeningAnalyzers } from '@lexiscreen/core/src/orchestration/create-analyzers.js';
import { createScreeningPipeline } from '@lexiscreen/core/src/orchestration/screening-pipeline.js';
import { formatModalityStatus } from '@lexiscreen/core/src/screening/summary-formatter.js';
import { createScreeningService } from '@lexiscreen/core/src/session/screening-service.js';
import type { ScreeningSessionRepository } from '@lexiscreen/core/src/repositories/screening-session.repository.js';
import { createInMemoryScreeningSessionRepository } from '@lexiscreen/core/src/repositories/in-memory-screening-session.repository.js';
import { createFirestoreClient } from '@lexiscreen/core/src/infrastructure/firestore-client.js';
import { createFirestoreScreeningSessionRepository } from '@lexiscreen/core/src/infrastructure/firestore-screening-session.repository.js';
import { ConfigurationError } from '@lexiscreen/shared/src/utils/errors.js';

function createSessionRepository(): ScreeningSessionRepository {
  const persistence = process.env['LEXISCREEN_PERSISTENCE'] ?? 'memory';
  if (persistence === 'firestore') {
    return createFirestoreScreeningSessionRepository(createFirestoreClient());
  }
  if (persistence !== 'memory') {
    throw new ConfigurationError(
      `Unknown LEXISCREEN_PERSISTENCE "${persistence}" (expected "memory" or "firestore")`,
    );
  }
  return createInMemoryScreeningSessionRepository();
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      text: { type: 'string' },
      audio: { type: 'string' },
      image: { type: 'string' },
      config: { type: 'string' },
      user: { type: 'string' },
    },
  });

  const configPath = values.config ?? resolve(process.cwd(), 'config', 'screening.json');
  const useMocks = process.env['LEXISCREEN_MOCK_MODELS'] === 'true';

  console.log('=== Lexiscreen Screening Runner ===\n');
  console.log(`Config: ${configPath}`);
  console.log(`Mock models: ${useMocks ? 'yes' : 'no'}`);
  console.log(`Text: ${values.text ?? '(none)'}`);
  console.log(`Audio: ${values.audio ?? '(none)'}`);
  console.log(`Image: ${values.image ?? '(none)'}\n`);

  const config = await loadScreeningConfig(configPath);
  const pipeline = createScreeningPipeline(
    createScreeningAnalyzers(config, createModelClients({ useMocks })),
    config,
  );
  const service = createScreeningService({
    pipeline,
    sessionRepository: createSessionRepository(),
  });

  const session = await service.screen({
    text: values.text,
    audioPath: values.audio,
    imagePath: values.image,
    userId: values.user,
    source: 'cli',
  });
  const { result } = session;

  console.log('--- Modalities ---');
  for (const modality of result.modalityResults) {
    console.log(`  ${formatModalityStatus(modality)}`);
    for (const recommendation of modality.recommendations) {
      console.log(`    - ${recommendation}`);
    }
  }

  console.log('\n--- Assessment ---');
  console.log(`  Analysis type: ${result.analysisType}`);
  console.log(`  Overall confidence: ${result.overallConfidence.toFixed(2)}`);
  console.log(`  Risk level: ${result.riskLevel}`);
  console.log(`  ${result.screeningSummary}`);

  console.log('\n--- Recommendations ---');
  for (const recommendation of result.recommendations) {
    console.log(`  - ${recommendation}`);
  }

  console.log(`\n=== Session ${session.id} completed in ${String(session.processingTimeMs)}ms ===`);
}

main().catch((error: unknown) => {
  console.error('Screening failed:', error);
  process.exit(1);
});

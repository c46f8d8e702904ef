import 'dotenv/config';
import { z } from 'zod';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createPool, ensureSchema, PgSessionProvider, toSqlClient } from './db.js';
import { PgReportQueries } from './services/report-service.js';
import { FileArtifactStore } from './storage/artifact-store.js';
import { createS3ObjectStorage } from './storage/object-storage.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('api');

const nowRowSchema = z.object({ now: z.date() });

async function main(): Promise<void> {
  const config = loadConfig();
  const pool = createPool(config.database);
  const client = toSqlClient(pool);

  await ensureSchema(client);

  if (!config.apiKey) {
    logger.warn('API_KEY is not set; guarded routes will reject every request.');
  }

  const app = createApp({
    sessions: new PgSessionProvider(pool),
    artifacts: new FileArtifactStore(config.backupDir),
    objects: createS3ObjectStorage(config.s3),
    reports: new PgReportQueries(client),
    ping: async () => {
      const { rows } = await client.query('select now() as now');
      return nowRowSchema.parse(rows[0]).now.toISOString();
    },
    apiKey: config.apiKey,
    batchMaxRows: config.batchMaxRows,
    migrationChunkSize: config.migrationChunkSize,
  });

  app.listen(config.port, () => {
    logger.info(`up on :${config.port}`);
  });
}

main().catch((error: unknown) => {
  logger.error('Failed to start', error);
  process.exit(1);
});

import express, { type Express } from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import cors from 'cors';
import swaggerUi from 'swagger-ui-express';
import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import YAML from 'yaml';
import { z } from 'zod';
import { healthRouter, type Ping } from './routes/health.js';
import { transactionsRouter } from './routes/transactions.js';
import { backupsRouter } from './routes/backups.js';
import { migrationsRouter } from './routes/migrations.js';
import { reportsRouter } from './routes/reports.js';
import { errorHandler } from './middleware/error-handler.js';
import { requireApiKey } from './middleware/api-key.js';
import type { SessionProvider } from './store/session.js';
import type { ArtifactStore } from './storage/artifact-store.js';
import type { ObjectStorage } from './storage/object-storage.js';
import type { ReportQueries } from './services/report-service.js';
import { DEFAULT_BATCH_MAX_ROWS } from './services/transaction-service.js';
import { DEFAULT_MIGRATION_CHUNK_SIZE } from './services/migration-service.js';

const currentDir = path.dirname(fileURLToPath(import.meta.url));
const openApiPath = path.resolve(currentDir, '../openapi/openapi.yaml');

function loadOpenApiDocument(file = openApiPath): Record<string, unknown> {
  return z.record(z.unknown()).parse(YAML.parse(readFileSync(file, 'utf8')));
}

export type AppDeps = {
  sessions: SessionProvider;
  artifacts: ArtifactStore;
  objects: ObjectStorage;
  reports: ReportQueries;
  ping: Ping;
  apiKey: string | null;
  batchMaxRows?: number;
  migrationChunkSize?: number;
  accessLog?: boolean;
};

export function createApp(deps: AppDeps): Express {
  const {
    sessions,
    artifacts,
    objects,
    reports,
    ping,
    apiKey,
    batchMaxRows = DEFAULT_BATCH_MAX_ROWS,
    migrationChunkSize = DEFAULT_MIGRATION_CHUNK_SIZE,
    accessLog = true,
  } = deps;
  const openApiDocument = loadOpenApiDocument();

  const app = express();
  app.set('trust proxy', true);
  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '2mb' }));
  if (accessLog) {
    app.use(morgan('combined'));
  }

  app.use('/api/v1/health', healthRouter(ping));

  app.use('/api/docs', swaggerUi.serve, swaggerUi.setup(openApiDocument));
  app.get('/api/v1/openapi.json', (_req, res) => {
    res.json(openApiDocument);
  });

  app.use(requireApiKey(apiKey));

  app.use('/api/v1/transactions', transactionsRouter({ sessions, batchMaxRows }));
  app.use('/api/v1/backups', backupsRouter({ sessions, artifacts }));
  app.use('/api/v1/migrations', migrationsRouter({ sessions, objects, chunkSize: migrationChunkSize }));
  app.use('/api/v1/reports', reportsRouter(reports));

  app.use(errorHandler);

  return app;
}

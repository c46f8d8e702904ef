import { Router } from 'express';
import { migrateHistoricalData, type MigrationDeps } from '../services/migration-service.js';
import { asyncHandler } from '../utils/async-handler.js';

export function migrationsRouter(deps: MigrationDeps): Router {
  const router = Router();

  router.post(
    '/historical',
    asyncHandler(async (_req, res) => {
      res.json(await migrateHistoricalData(deps));
    })
  );

  return router;
}

import { Router } from 'express';
import { createBackup, listBackups, restoreTable, type BackupDeps } from '../services/backup-service.js';
import { asyncHandler } from '../utils/async-handler.js';

export function backupsRouter(deps: BackupDeps): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      res.json(await listBackups(deps));
    })
  );

  router.post(
    '/',
    asyncHandler(async (_req, res) => {
      const summary = await createBackup(deps);
      res.status(201).json(summary);
    })
  );

  router.post(
    '/:table/restore',
    asyncHandler(async (req, res) => {
      const { message, restored } = await restoreTable(deps, req.params.table);
      res.json({ message, restored });
    })
  );

  return router;
}

import { Router } from 'express';
import { z } from 'zod';
import { DEFAULT_REPORT_YEAR, type ReportQueries } from '../services/report-service.js';
import { asyncHandler } from '../utils/async-handler.js';

const reportQuerySchema = z.object({
  year: z.coerce.number().int().min(1900).max(9999).default(DEFAULT_REPORT_YEAR),
});

export function reportsRouter(reports: ReportQueries): Router {
  const router = Router();

  router.get(
    '/hired-per-quarter',
    asyncHandler(async (req, res) => {
      const { year } = reportQuerySchema.parse(req.query);
      res.json(await reports.hiredPerQuarter(year));
    })
  );

  router.get(
    '/departments-above-average',
    asyncHandler(async (req, res) => {
      const { year } = reportQuerySchema.parse(req.query);
      res.json(await reports.departmentsAboveAverage(year));
    })
  );

  return router;
}

import { Router } from 'express';
import { z } from 'zod';
import { insertTransactions } from '../services/transaction-service.js';
import type { SessionProvider } from '../store/session.js';
import { asyncHandler } from '../utils/async-handler.js';

// Element shapes are left to the batch validator so every violation is reported.
const rowList = z.array(z.record(z.unknown()));

const batchSchema = z.object({
  departments: rowList.nullish().transform((rows) => rows ?? []),
  jobs: rowList.nullish().transform((rows) => rows ?? []),
  hired_employees: rowList,
});

export type TransactionRoutesDeps = {
  sessions: SessionProvider;
  batchMaxRows: number;
};

export function transactionsRouter({ sessions, batchMaxRows }: TransactionRoutesDeps): Router {
  const router = Router();

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const batch = batchSchema.parse(req.body);
      const inserted = await insertTransactions(sessions, batch, { maxRows: batchMaxRows });
      res.status(201).json({ message: 'Transactions inserted successfully.', inserted });
    })
  );

  return router;
}

import { Router } from 'express';
import { asyncHandler } from '../utils/async-handler.js';

export type Ping = () => Promise<string>;

export function healthRouter(ping: Ping): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      const time = await ping();
      res.json({ status: 'ok', time });
    })
  );

  return router;
}

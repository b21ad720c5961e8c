import { Router, type Request, type Response } from 'express';
import { successResponse, sendAppError } from '../middleware/error-handler.js';
import { getDirectoryStats } from '../../services/directory/index.js';
import type { ApiDeps } from './shared.js';

export function createStatsRouter({ db }: Pick<ApiDeps, 'db'>): Router {
  const router = Router();

  router.get('/stats', async (_req: Request, res: Response) => {
    const stats = await getDirectoryStats(db);
    if (!stats.ok) return sendAppError(res, stats.error);

    res.json(successResponse(stats.value));
  });

  return router;
}

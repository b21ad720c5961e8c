import { Router, type Request, type Response } from 'express';
import { flagListQuery } from '../../domain/schemas.js';
import { successResponse, sendAppError, sendValidationError } from '../middleware/error-handler.js';
import { listFlags, resolveFlag } from '../../services/flags/index.js';
import { paramString, type ApiDeps } from './shared.js';

export function createFlagsRouter({ db }: Pick<ApiDeps, 'db'>): Router {
  const router = Router();

  router.get('/flags', async (req: Request, res: Response) => {
    const parsed = flagListQuery.safeParse(req.query);
    if (!parsed.success) return sendValidationError(res, parsed.error, 'Invalid query parameters');

    const flags = await listFlags(db, parsed.data);
    if (!flags.ok) return sendAppError(res, flags.error);

    res.json(successResponse({ flags: flags.value, count: flags.value.length }));
  });

  router.post('/flags/:id/resolve', async (req: Request, res: Response) => {
    const flag = await resolveFlag(db, paramString(req.params.id));
    if (!flag.ok) return sendAppError(res, flag.error);

    res.json(successResponse(flag.value));
  });

  return router;
}

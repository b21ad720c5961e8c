import { Router, type Request, type Response } from 'express';
import { paginationQuery, providerRecordInput } from '../../domain/schemas.js';
import { successResponse, sendAppError, sendValidationError } from '../middleware/error-handler.js';
import * as providerService from '../../services/provider/index.js';
import * as resultService from '../../services/validation-result/index.js';
import { assessQuality } from '../../services/scoring/index.js';
import { paramString, type ApiDeps } from './shared.js';

export function createProvidersRouter({ db, runner }: ApiDeps): Router {
  const router = Router();

  router.post('/providers', async (req: Request, res: Response) => {
    const parsed = providerRecordInput.safeParse(req.body);
    if (!parsed.success) return sendValidationError(res, parsed.error);

    const saved = await providerService.upsertProvider(db, parsed.data);
    if (!saved.ok) return sendAppError(res, saved.error);

    res.status(201).json(successResponse(saved.value));
  });

  router.get('/providers', async (req: Request, res: Response) => {
    const parsed = paginationQuery.safeParse(req.query);
    if (!parsed.success) return sendValidationError(res, parsed.error, 'Invalid query parameters');

    const page = await providerService.listProviders(db, parsed.data);
    if (!page.ok) return sendAppError(res, page.error);

    res.json(successResponse(page.value));
  });

  router.get('/providers/:id', async (req: Request, res: Response) => {
    const provider = await providerService.getProvider(db, paramString(req.params.id));
    if (!provider.ok) return sendAppError(res, provider.error);

    res.json(successResponse(provider.value));
  });

  router.post('/providers/:id/validate', async (req: Request, res: Response) => {
    const result = await runner.validateStoredProvider(paramString(req.params.id));
    if (!result.ok) return sendAppError(res, result.error);

    res.status(201).json(successResponse({ result: result.value, quality: assessQuality(result.value) }));
  });

  router.get('/providers/:id/validation', async (req: Request, res: Response) => {
    const result = await resultService.getLatestValidationResult(db, paramString(req.params.id));
    if (!result.ok) return sendAppError(res, result.error);

    res.json(successResponse({ result: result.value, quality: assessQuality(result.value) }));
  });

  return router;
}

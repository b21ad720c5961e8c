import { Router, type Request, type Response } from 'express';
import { createJobInput } from '../../domain/schemas.js';
import { successResponse, sendAppError, sendValidationError } from '../middleware/error-handler.js';
import { getJob } from '../../services/job/index.js';
import { getJobResults } from '../../services/validation-result/index.js';
import { paramString, type ApiDeps } from './shared.js';

export function createJobsRouter({ db, runner }: ApiDeps): Router {
  const router = Router();

  router.post('/jobs', async (req: Request, res: Response) => {
    const parsed = createJobInput.safeParse(req.body);
    if (!parsed.success) return sendValidationError(res, parsed.error);

    const job = await runner.startValidationJob({
      providers: parsed.data.providers,
      filename: parsed.data.filename ?? null,
    });
    if (!job.ok) return sendAppError(res, job.error);

    res.status(202).json(successResponse(job.value));
  });

  router.get('/jobs/:id', async (req: Request, res: Response) => {
    const jobId = paramString(req.params.id);
    const job = await getJob(db, jobId);
    if (!job.ok) return sendAppError(res, job.error);

    res.json(successResponse({ ...job.value, running: runner.isRunning(jobId) }));
  });

  router.get('/jobs/:id/results', async (req: Request, res: Response) => {
    const jobId = paramString(req.params.id);
    const job = await getJob(db, jobId);
    if (!job.ok) return sendAppError(res, job.error);

    const results = await getJobResults(db, jobId);
    if (!results.ok) return sendAppError(res, results.error);

    res.json(successResponse({ job: job.value, results: results.value }));
  });

  router.post('/jobs/:id/cancel', async (req: Request, res: Response) => {
    const jobId = paramString(req.params.id);
    const job = await getJob(db, jobId);
    if (!job.ok) return sendAppError(res, job.error);

    const cancelled = runner.cancelValidationJob(jobId);
    if (!cancelled.ok) return sendAppError(res, cancelled.error);

    res.status(202).json(successResponse({ jobId, status: 'CANCELLING' }));
  });

  return router;
}

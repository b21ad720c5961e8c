import express from 'express';
import { setupOpenAPI } from './openapi/index.js';
import { createProvidersRouter } from './routes/providers.js';
import { createJobsRouter } from './routes/jobs.js';
import { createFlagsRouter } from './routes/flags.js';
import { createStatsRouter } from './routes/stats.js';
import type { ApiDeps } from './routes/shared.js';
import { requestLogger } from './middleware/request-logger.js';
import { errorHandler } from './middleware/error-handler.js';

export type { ApiDeps } from './routes/shared.js';

export function createApp(deps: ApiDeps): express.Express {
  const app = express();

  app.use(express.json({ limit: '10mb' }));
  app.use(requestLogger);

  setupOpenAPI(app);

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(createProvidersRouter(deps));
  app.use(createJobsRouter(deps));
  app.use(createFlagsRouter(deps));
  app.use(createStatsRouter(deps));

  app.use(errorHandler);

  return app;
}

import type { Request, Response, NextFunction } from 'express';
import { logger } from '../../infrastructure/logger.js';

const log = logger.child({ module: 'http-api' });

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = process.hrtime.bigint();

  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - start) / 1e6;
    const level = res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'info';

    log[level](
      { method: req.method, path: req.path, statusCode: res.statusCode, durationMs: Math.round(durationMs * 100) / 100 },
      'HTTP request',
    );
  });

  next();
}

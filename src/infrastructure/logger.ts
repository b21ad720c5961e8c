import pino from 'pino';

export const logger = pino({
  name: 'provider-validation',
  level: process.env.LOG_LEVEL ?? 'info',
});

export function createValidationLogger(providerId: string, jobId?: string) {
  return logger.child({
    providerId,
    ...(jobId !== undefined && { jobId }),
  });
}

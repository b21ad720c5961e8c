import { z } from 'zod';

const DEFAULT_NPI_REGISTRY_URL = 'https://npiregistry.cms.hhs.gov/api/';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  PORT: positiveInt(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DATABASE_URL: z.string().optional(),

  NPI_REGISTRY_API_URL: z.string().url().default(DEFAULT_NPI_REGISTRY_URL),
  TOMTOM_API_KEY: z.string().default(''),
  LOCATIONIQ_API_KEY: z.string().default(''),
  NUMVERIFY_API_KEY: z.string().default(''),

  API_TIMEOUT_SECONDS: positiveInt(30),
  API_RETRY_ATTEMPTS: positiveInt(3),
  API_RETRY_DELAY_SECONDS: z.coerce.number().nonnegative().default(2),
  MAX_CONCURRENT_VALIDATIONS: positiveInt(10),
});

export interface AppConfig {
  port: number;
  logLevel: string;
  databaseUrl: string | null;
  npiRegistryUrl: string;
  apiKeys: {
    tomtom: string;
    locationIq: string;
    numVerify: string;
  };
  http: {
    timeoutMs: number;
    retryAttempts: number;
    retryDelayMs: number;
  };
  maxConcurrentValidations: number;
}

/** @throws {Error} If an environment variable is present but malformed */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    databaseUrl: e.DATABASE_URL ?? null,
    npiRegistryUrl: e.NPI_REGISTRY_API_URL,
    apiKeys: {
      tomtom: e.TOMTOM_API_KEY,
      locationIq: e.LOCATIONIQ_API_KEY,
      numVerify: e.NUMVERIFY_API_KEY,
    },
    http: {
      timeoutMs: e.API_TIMEOUT_SECONDS * 1000,
      retryAttempts: e.API_RETRY_ATTEMPTS,
      retryDelayMs: e.API_RETRY_DELAY_SECONDS * 1000,
    },
    maxConcurrentValidations: e.MAX_CONCURRENT_VALIDATIONS,
  };
}

import type { Database } from '../../infrastructure/db/client.js';
import type { ValidationRunner } from '../../services/job/index.js';

export interface ApiDeps {
  db: Database;
  runner: ValidationRunner;
}

export function paramString(val: string | string[]): string {
  return Array.isArray(val) ? val[0] : val;
}

import { asc, desc, eq } from 'drizzle-orm';
import type { Database } from '../../infrastructure/db/client.js';
import { validationResults } from '../../infrastructure/db/schema.js';
import type { Flag, StoredValidationResult, ValidationResult } from '../../domain/types.js';

export type ValidationResultRow = typeof validationResults.$inferSelect;

export function toStoredResult(row: ValidationResultRow, flags: Flag[]): StoredValidationResult {
  return {
    id: row.id,
    providerId: row.providerId,
    jobId: row.jobId,
    timestamp: row.validatedAt,
    durationSeconds: row.durationSeconds,
    validations: row.validations,
    overallConfidence: row.overallConfidence,
    status: row.status,
    flags,
    anomalies: row.anomalies,
    recommendations: row.recommendations,
    sourcesUsed: row.sourcesUsed,
    error: row.errorMessage,
  };
}

export async function insertValidationResult(db: Database, result: ValidationResult): Promise<ValidationResultRow> {
  const rows = await db
    .insert(validationResults)
    .values({
      providerId: result.providerId,
      jobId: result.jobId,
      validatedAt: result.timestamp,
      durationSeconds: result.durationSeconds,
      overallConfidence: result.overallConfidence,
      status: result.status,
      validations: result.validations,
      anomalies: result.anomalies,
      recommendations: result.recommendations,
      sourcesUsed: result.sourcesUsed,
      errorMessage: result.error,
    })
    .returning();

  return rows[0];
}

export async function findLatestForProvider(db: Database, providerId: string): Promise<ValidationResultRow | null> {
  const rows = await db
    .select()
    .from(validationResults)
    .where(eq(validationResults.providerId, providerId))
    .orderBy(desc(validationResults.validatedAt))
    .limit(1);

  return rows.length > 0 ? rows[0] : null;
}

export async function findForJob(db: Database, jobId: string): Promise<ValidationResultRow[]> {
  return db
    .select()
    .from(validationResults)
    .where(eq(validationResults.jobId, jobId))
    .orderBy(asc(validationResults.validatedAt));
}

import { eq } from 'drizzle-orm';
import type { Database } from '../../infrastructure/db/client.js';
import { processingJobs } from '../../infrastructure/db/schema.js';
import type { JobStatus, ProcessingJob } from '../../domain/types.js';

export interface JobProgress {
  processedCount: number;
  successCount: number;
  errorCount: number;
}

export interface JobCompletion {
  status: Extract<JobStatus, 'COMPLETED' | 'FAILED' | 'CANCELLED'>;
  completedAt: Date;
  errorMessage?: string | null;
  /** Final counters, written together with the status. */
  progress?: JobProgress;
}

function toProcessingJob(row: typeof processingJobs.$inferSelect): ProcessingJob {
  return {
    id: row.id,
    filename: row.filename,
    totalProviders: row.totalProviders,
    status: row.status,
    processedCount: row.processedCount,
    successCount: row.successCount,
    errorCount: row.errorCount,
    startedAt: row.startedAt,
    completedAt: row.completedAt,
    errorMessage: row.errorMessage,
    createdAt: row.createdAt,
  };
}

export async function insertJob(db: Database, totalProviders: number, filename: string | null): Promise<ProcessingJob> {
  const rows = await db.insert(processingJobs).values({ totalProviders, filename, status: 'PENDING' }).returning();
  return toProcessingJob(rows[0]);
}

export async function findJobById(db: Database, id: string): Promise<ProcessingJob | null> {
  const rows = await db.select().from(processingJobs).where(eq(processingJobs.id, id));
  return rows.length > 0 ? toProcessingJob(rows[0]) : null;
}

export async function markJobStarted(db: Database, id: string, startedAt: Date): Promise<ProcessingJob | null> {
  const rows = await db
    .update(processingJobs)
    .set({ status: 'PROCESSING', startedAt })
    .where(eq(processingJobs.id, id))
    .returning();

  return rows.length > 0 ? toProcessingJob(rows[0]) : null;
}

export async function updateJobCounters(db: Database, id: string, progress: JobProgress): Promise<ProcessingJob | null> {
  const rows = await db.update(processingJobs).set(progress).where(eq(processingJobs.id, id)).returning();
  return rows.length > 0 ? toProcessingJob(rows[0]) : null;
}

export async function markJobFinished(db: Database, id: string, completion: JobCompletion): Promise<ProcessingJob | null> {
  const rows = await db
    .update(processingJobs)
    .set({
      status: completion.status,
      completedAt: completion.completedAt,
      errorMessage: completion.errorMessage ?? null,
      ...completion.progress,
    })
    .where(eq(processingJobs.id, id))
    .returning();

  return rows.length > 0 ? toProcessingJob(rows[0]) : null;
}

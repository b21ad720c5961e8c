import { and, asc, count, desc, eq, inArray, type SQL } from 'drizzle-orm';
import type { Database } from '../../infrastructure/db/client.js';
import { flags } from '../../infrastructure/db/schema.js';
import type { Flag, FlagType } from '../../domain/types.js';

export interface FlagFilter {
  resolved?: boolean;
  providerId?: string;
  flagType?: FlagType;
}

export interface FlagWithResult extends Flag {
  validationResultId: string | null;
}

function toFlag(row: typeof flags.$inferSelect): FlagWithResult {
  return {
    id: row.id,
    providerId: row.providerId,
    validationResultId: row.validationResultId,
    flagType: row.flagType,
    severity: row.severity,
    field: row.field,
    message: row.message,
    details: row.details,
    resolved: row.resolved,
    resolvedAt: row.resolvedAt,
    createdAt: row.createdAt,
  };
}

export async function insertFlags(
  db: Database,
  items: readonly Flag[],
  validationResultId: string | null,
): Promise<FlagWithResult[]> {
  if (items.length === 0) return [];

  const rows = await db
    .insert(flags)
    .values(
      items.map((flag, position) => ({
        id: flag.id,
        position,
        providerId: flag.providerId,
        validationResultId,
        flagType: flag.flagType,
        severity: flag.severity,
        field: flag.field,
        message: flag.message,
        details: flag.details,
        resolved: flag.resolved,
        resolvedAt: flag.resolvedAt,
        createdAt: flag.createdAt,
      })),
    )
    .returning();

  return rows.map(toFlag);
}

export async function findFlags(db: Database, filter: FlagFilter): Promise<FlagWithResult[]> {
  const conditions: SQL[] = [];
  if (filter.resolved !== undefined) conditions.push(eq(flags.resolved, filter.resolved));
  if (filter.providerId !== undefined) conditions.push(eq(flags.providerId, filter.providerId));
  if (filter.flagType !== undefined) conditions.push(eq(flags.flagType, filter.flagType));

  const rows = await db
    .select()
    .from(flags)
    .where(conditions.length > 0 ? and(...conditions) : undefined)
    .orderBy(desc(flags.createdAt));

  return rows.map(toFlag);
}

export async function findFlagsForResults(db: Database, resultIds: readonly string[]): Promise<FlagWithResult[]> {
  if (resultIds.length === 0) return [];
  const rows = await db
    .select()
    .from(flags)
    .where(inArray(flags.validationResultId, [...resultIds]))
    .orderBy(asc(flags.position));
  return rows.map(toFlag);
}

export async function findFlagById(db: Database, id: string): Promise<FlagWithResult | null> {
  const rows = await db.select().from(flags).where(eq(flags.id, id));
  return rows.length > 0 ? toFlag(rows[0]) : null;
}

export async function markFlagResolved(db: Database, id: string, resolvedAt: Date): Promise<FlagWithResult | null> {
  const rows = await db
    .update(flags)
    .set({ resolved: true, resolvedAt })
    .where(eq(flags.id, id))
    .returning();

  return rows.length > 0 ? toFlag(rows[0]) : null;
}

export async function countUnresolvedByType(db: Database): Promise<Record<FlagType, number>> {
  const rows = await db
    .select({ flagType: flags.flagType, total: count() })
    .from(flags)
    .where(eq(flags.resolved, false))
    .groupBy(flags.flagType);

  const counts: Record<FlagType, number> = { CRITICAL: 0, WARNING: 0, INFO: 0 };
  for (const row of rows) counts[row.flagType] = row.total;
  return counts;
}

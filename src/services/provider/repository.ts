import { asc, count, eq } from 'drizzle-orm';
import type { Database } from '../../infrastructure/db/client.js';
import { providers } from '../../infrastructure/db/schema.js';
import type { ProviderRecord, StoredProvider } from '../../domain/types.js';

function toStoredProvider(row: typeof providers.$inferSelect): StoredProvider {
  return {
    providerId: row.providerId,
    npi: row.npi,
    firstName: row.firstName,
    lastName: row.lastName,
    fullName: row.fullName,
    specialty: row.specialty,
    practiceAddress: row.practiceAddress,
    city: row.city,
    state: row.state,
    zipCode: row.zipCode,
    phone: row.phone,
    email: row.email,
    website: row.website,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export async function findProviderById(db: Database, providerId: string): Promise<StoredProvider | null> {
  const rows = await db.select().from(providers).where(eq(providers.providerId, providerId));
  return rows.length > 0 ? toStoredProvider(rows[0]) : null;
}

export async function upsertProviderRow(db: Database, record: ProviderRecord): Promise<StoredProvider> {
  const { providerId, ...fields } = record;
  const rows = await db
    .insert(providers)
    .values(record)
    .onConflictDoUpdate({
      target: providers.providerId,
      set: { ...fields, updatedAt: new Date() },
    })
    .returning();

  return toStoredProvider(rows[0]);
}

export async function findProviders(db: Database, limit: number, offset: number): Promise<StoredProvider[]> {
  const rows = await db.select().from(providers).orderBy(asc(providers.providerId)).limit(limit).offset(offset);
  return rows.map(toStoredProvider);
}

export async function countProviders(db: Database): Promise<number> {
  const rows = await db.select({ total: count() }).from(providers);
  return rows.length > 0 ? rows[0].total : 0;
}

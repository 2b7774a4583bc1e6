import { asc, eq, gte } from 'drizzle-orm';
import type { CredentialRecord } from '../../domain/index.js';
import type { Database } from './client.js';
import { users } from './schema.js';

/** Row shape returned by user queries. */
export type UserRow = typeof users.$inferSelect;

export function toCredential(row: UserRow): CredentialRecord {
  return {
    device_id: row.device_id,
    name: row.name,
    email: row.email,
    access_token: row.access_token,
    refresh_token: row.refresh_token,
    last_used_at: row.last_used_at,
  };
}

/**
 * Delete-then-insert by email inside one transaction, so readers never
 * observe the gap and the unique index never trips on a re-save.
 */
export async function replaceUser(db: Database, record: CredentialRecord): Promise<CredentialRecord> {
  return db.transaction(async (tx) => {
    await tx.delete(users).where(eq(users.email, record.email));
    const rows = await tx
      .insert(users)
      .values({
        device_id: record.device_id,
        name: record.name,
        email: record.email,
        access_token: record.access_token,
        refresh_token: record.refresh_token,
        last_used_at: record.last_used_at,
      })
      .returning();

    const row = rows[0];
    if (!row) {
      throw new Error(`INSERT into users returned no row for ${record.email}`);
    }
    return toCredential(row);
  });
}

export async function findUserByEmail(db: Database, email: string): Promise<CredentialRecord | undefined> {
  const rows = await db.select().from(users).where(eq(users.email, email)).limit(1);
  const row = rows[0];
  return row ? toCredential(row) : undefined;
}

export async function findAllUsers(db: Database): Promise<CredentialRecord[]> {
  const rows = await db.select().from(users).orderBy(asc(users.id));
  return rows.map(toCredential);
}

export async function findUsersUsedSince(db: Database, threshold: Date): Promise<CredentialRecord[]> {
  const rows = await db
    .select()
    .from(users)
    .where(gte(users.last_used_at, threshold))
    .orderBy(asc(users.id));
  return rows.map(toCredential);
}

import { and, desc, eq, gte, lt } from 'drizzle-orm';
import type { DayWindow, ReportRecord } from '../../domain/index.js';
import type { Database } from './client.js';
import { reports } from './schema.js';

/** Row shape returned by report queries. */
export type ReportRow = typeof reports.$inferSelect;

export function toReport(row: ReportRow): ReportRecord {
  return {
    email: row.email,
    spent_time: row.spent_time,
    call_time: row.call_time,
    date: row.date,
    wfh: row.wfh,
  };
}

function sameDay(email: string, window: DayWindow) {
  return and(eq(reports.email, email), gte(reports.date, window.from), lt(reports.date, window.to));
}

/** Removes the email's reports dated within `window`, then inserts. */
export async function replaceReport(db: Database, record: ReportRecord, window: DayWindow): Promise<ReportRecord> {
  return db.transaction(async (tx) => {
    await tx.delete(reports).where(sameDay(record.email, window));
    const rows = await tx
      .insert(reports)
      .values({
        email: record.email,
        spent_time: record.spent_time,
        call_time: record.call_time,
        date: record.date,
        wfh: record.wfh,
      })
      .returning();

    const row = rows[0];
    if (!row) {
      throw new Error(`INSERT into reports returned no row for ${record.email}`);
    }
    return toReport(row);
  });
}

export async function findReport(db: Database, email: string, window: DayWindow): Promise<ReportRecord | undefined> {
  const rows = await db
    .select()
    .from(reports)
    .where(sameDay(email, window))
    .orderBy(desc(reports.date))
    .limit(1);

  const row = rows[0];
  return row ? toReport(row) : undefined;
}

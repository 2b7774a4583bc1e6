import { and, count, desc, eq, gte, lt, lte, sql, type SQL } from 'drizzle-orm';
import { persistedEvent } from '../../domain/index.js';
import type { DayWindow, EventBody, PersistedEvent, TimeRange } from '../../domain/index.js';
import type { Database } from './client.js';
import { events } from './schema.js';

/** Row shape returned by event queries. */
export type EventDbRow = typeof events.$inferSelect;

export function toEvent(row: EventDbRow): PersistedEvent {
  return persistedEvent(String(row.id), {
    timestamp: row.timestamp,
    duration: row.duration,
    data: row.data,
  });
}

function toValues(bucketKey: number, event: EventBody) {
  return {
    bucket_key: bucketKey,
    timestamp: event.timestamp,
    duration: event.duration,
    data: event.data,
  };
}

/**
 * Overlap predicate: the event starts no later than `end` and finishes
 * no earlier than `start`. Only provided bounds are applied.
 */
function overlapConditions(range: TimeRange): SQL[] {
  const conditions: SQL[] = [];

  if (range.start !== undefined) {
    conditions.push(
      sql`${events.timestamp} + ${events.duration} * interval '1 second' >= ${range.start.toISOString()}::timestamptz`,
    );
  }
  if (range.end !== undefined) {
    conditions.push(lte(events.timestamp, range.end));
  }

  return conditions;
}

export async function findEventById(
  db: Database,
  bucketKey: number,
  eventId: number,
): Promise<PersistedEvent | undefined> {
  const rows = await db
    .select()
    .from(events)
    .where(and(eq(events.bucket_key, bucketKey), eq(events.id, eventId)))
    .limit(1);

  const row = rows[0];
  return row ? toEvent(row) : undefined;
}

/**
 * Fetches events overlapping `range`.
 * Ordering: newest timestamp first, later inserts first on ties.
 */
export async function queryEvents(
  db: Database,
  bucketKey: number,
  range: TimeRange,
  limit: number,
): Promise<PersistedEvent[]> {
  const rows = await db
    .select()
    .from(events)
    .where(and(eq(events.bucket_key, bucketKey), ...overlapConditions(range)))
    .orderBy(desc(events.timestamp), desc(events.id))
    .limit(limit);

  return rows.map(toEvent);
}

export async function countEvents(db: Database, bucketKey: number, range: TimeRange): Promise<number> {
  const rows = await db
    .select({ count: count() })
    .from(events)
    .where(and(eq(events.bucket_key, bucketKey), ...overlapConditions(range)));

  return Number(rows[0]?.count ?? 0);
}

export async function findLastEvent(
  db: Database,
  bucketKey: number,
  window?: DayWindow,
): Promise<PersistedEvent | undefined> {
  const conditions: SQL[] = [eq(events.bucket_key, bucketKey)];
  if (window !== undefined) {
    conditions.push(gte(events.timestamp, window.from), lt(events.timestamp, window.to));
  }

  const rows = await db
    .select()
    .from(events)
    .where(and(...conditions))
    .orderBy(desc(events.timestamp), desc(events.id))
    .limit(1);

  const row = rows[0];
  return row ? toEvent(row) : undefined;
}

export async function insertEvent(db: Database, bucketKey: number, event: EventBody): Promise<PersistedEvent> {
  const rows = await db.insert(events).values(toValues(bucketKey, event)).returning();
  const row = rows[0];
  if (!row) {
    throw new Error(`INSERT into events returned no row for bucket key ${bucketKey}`);
  }
  return toEvent(row);
}

/** Multi-row INSERT; a single statement, so the chunk lands whole or not at all. */
export async function insertEvents(db: Database, bucketKey: number, chunk: readonly EventBody[]): Promise<void> {
  if (chunk.length === 0) {
    return;
  }
  await db.insert(events).values(chunk.map((event) => toValues(bucketKey, event)));
}

export async function updateEvent(
  db: Database,
  bucketKey: number,
  eventId: number,
  event: EventBody,
): Promise<PersistedEvent | undefined> {
  const rows = await db
    .update(events)
    .set({ timestamp: event.timestamp, duration: event.duration, data: event.data })
    .where(and(eq(events.bucket_key, bucketKey), eq(events.id, eventId)))
    .returning();

  const row = rows[0];
  return row ? toEvent(row) : undefined;
}

export async function deleteEvent(db: Database, bucketKey: number, eventId: number): Promise<boolean> {
  const rows = await db
    .delete(events)
    .where(and(eq(events.bucket_key, bucketKey), eq(events.id, eventId)))
    .returning({ id: events.id });

  return rows.length > 0;
}

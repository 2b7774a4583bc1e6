import {
  pgTable,
  serial,
  bigserial,
  integer,
  varchar,
  timestamp,
  doublePrecision,
  boolean,
  jsonb,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';

/**
 * Drizzle schema for the `buckets` table.
 *
 * `key` is the internal identity events point at; `id` is the public,
 * caller-chosen handle and carries the uniqueness constraint.
 */
export const buckets = pgTable('buckets', {
  key: serial('key').primaryKey(),
  id: varchar('id', { length: 255 }).notNull(),
  name: varchar('name', { length: 255 }),
  type: varchar('type', { length: 255 }).notNull(),
  client: varchar('client', { length: 255 }).notNull(),
  hostname: varchar('hostname', { length: 255 }).notNull(),
  created: timestamp('created', { withTimezone: true }).notNull(),
}, (table) => [
  uniqueIndex('idx_buckets_id').on(table.id),
]);

/**
 * Drizzle schema for the `events` table.
 *
 * `duration` is seconds. `data` is opaque to the store.
 * Rows are removed with their bucket (ON DELETE CASCADE).
 */
export const events = pgTable('events', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  bucket_key: integer('bucket_key')
    .notNull()
    .references(() => buckets.key, { onDelete: 'cascade' }),
  timestamp: timestamp('timestamp', { withTimezone: true }).notNull(),
  duration: doublePrecision('duration').notNull().default(0),
  data: jsonb('data').$type<Record<string, unknown>>().notNull().default({}),
}, (table) => [
  index('idx_events_bucket_key').on(table.bucket_key),
  index('idx_events_bucket_timestamp').on(table.bucket_key, table.timestamp),
]);

/** Device credentials; `email` is the natural key. */
export const users = pgTable('users', {
  id: serial('id').primaryKey(),
  device_id: varchar('device_id', { length: 255 }).notNull(),
  name: varchar('name', { length: 255 }).notNull(),
  email: varchar('email', { length: 255 }).notNull(),
  access_token: varchar('access_token', { length: 4096 }).notNull(),
  refresh_token: varchar('refresh_token', { length: 4096 }).notNull(),
  last_used_at: timestamp('last_used_at', { withTimezone: true }),
}, (table) => [
  uniqueIndex('idx_users_email').on(table.email),
  index('idx_users_last_used_at').on(table.last_used_at),
]);

/** Daily reports; one per email per UTC day, enforced by the store. */
export const reports = pgTable('reports', {
  id: serial('id').primaryKey(),
  email: varchar('email', { length: 255 }).notNull(),
  spent_time: doublePrecision('spent_time').notNull(),
  call_time: doublePrecision('call_time').notNull(),
  date: timestamp('date', { withTimezone: true }).notNull(),
  wfh: boolean('wfh').notNull(),
}, (table) => [
  index('idx_reports_email_date').on(table.email, table.date),
]);

import type { Sql } from './client.js';

/**
 * Ensures tables exist (lightweight migration via raw SQL).
 *
 * Mirrors `schema.ts`; drizzle-kit (`npm run db:push`) remains the way to
 * evolve an existing database. Safe to run on every connect.
 */
export async function ensureSchema(sql: Sql): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS buckets (
      key       SERIAL PRIMARY KEY,
      id        VARCHAR(255) NOT NULL,
      name      VARCHAR(255),
      type      VARCHAR(255) NOT NULL,
      client    VARCHAR(255) NOT NULL,
      hostname  VARCHAR(255) NOT NULL,
      created   TIMESTAMPTZ  NOT NULL
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS events (
      id          BIGSERIAL PRIMARY KEY,
      bucket_key  INTEGER NOT NULL REFERENCES buckets (key) ON DELETE CASCADE,
      timestamp   TIMESTAMPTZ NOT NULL,
      duration    DOUBLE PRECISION NOT NULL DEFAULT 0,
      data        JSONB NOT NULL DEFAULT '{}'
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS users (
      id             SERIAL PRIMARY KEY,
      device_id      VARCHAR(255)  NOT NULL,
      name           VARCHAR(255)  NOT NULL,
      email          VARCHAR(255)  NOT NULL,
      access_token   VARCHAR(4096) NOT NULL,
      refresh_token  VARCHAR(4096) NOT NULL,
      last_used_at   TIMESTAMPTZ
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS reports (
      id          SERIAL PRIMARY KEY,
      email       VARCHAR(255)     NOT NULL,
      spent_time  DOUBLE PRECISION NOT NULL,
      call_time   DOUBLE PRECISION NOT NULL,
      date        TIMESTAMPTZ      NOT NULL,
      wfh         BOOLEAN          NOT NULL
    )
  `);

  await sql.unsafe(`CREATE UNIQUE INDEX IF NOT EXISTS idx_buckets_id ON buckets (id)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_events_bucket_key ON events (bucket_key)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_events_bucket_timestamp ON events (bucket_key, timestamp)`);
  await sql.unsafe(`CREATE UNIQUE INDEX IF NOT EXISTS idx_users_email ON users (email)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_users_last_used_at ON users (last_used_at)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_reports_email_date ON reports (email, date)`);
}

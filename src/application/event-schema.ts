import { z } from 'zod';
import { pendingEvent, persistedEvent, toUtc } from '../domain/index.js';
import type { Event } from '../domain/index.js';

/**
 * An instant as accepted at the boundary: a `Date`, or an ISO-8601 string
 * with `Z` or an explicit offset. Always normalised to UTC.
 */
export const instantSchema = z
  .union([
    z.string().datetime({ offset: true, message: 'Must be an ISO-8601 datetime with offset' }),
    z.date(),
  ])
  .transform((value) => toUtc(value));

const durationSchema = z.number().finite().nonnegative();

const dataSchema = z.record(z.string(), z.unknown());

/**
 * Zod schema for a single inbound event.
 *
 * - `id` absent/null means "not yet persisted"; numeric ids are accepted
 *   and carried as strings.
 * - `duration` is seconds and defaults to 0.
 * - `data` is opaque and defaults to `{}`.
 */
export const eventInputSchema = z
  .object({
    id: z.union([z.string().min(1), z.number().int().nonnegative()]).nullish(),
    timestamp: instantSchema,
    duration: durationSchema.default(0),
    data: dataSchema.default({}),
  })
  .transform((e): Event => {
    const body = { timestamp: e.timestamp, duration: e.duration, data: e.data };
    return e.id === null || e.id === undefined ? pendingEvent(body) : persistedEvent(String(e.id), body);
  });

export type EventInput = z.input<typeof eventInputSchema>;

export const eventBatchSchema = z.array(eventInputSchema);

/** Checks an already-typed body before it is written. */
export const eventBodySchema = z.object({
  timestamp: z.date(),
  duration: durationSchema,
  data: dataSchema,
});

/** Query bounds; either side may be omitted but must be a real instant when given. */
export const timeRangeSchema = z.object({
  start: z.date().optional(),
  end: z.date().optional(),
});

/**
 * Schema for bucket creation. `name` is optional and stored as null
 * when absent.
 */
export const createBucketSchema = z.object({
  id: z.string().min(1).max(255),
  type: z.string().min(1).max(255),
  client: z.string().max(255),
  hostname: z.string().max(255),
  created: instantSchema,
  name: z
    .string()
    .max(255)
    .nullish()
    .transform((v) => v ?? null),
});

export type CreateBucketInput = z.input<typeof createBucketSchema>;

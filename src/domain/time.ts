import { ValidationError } from './errors.js';

/**
 * Time model shared by every backend.
 *
 * Instants are JS `Date`s, which are UTC-based; normalisation means parsing
 * any offset-carrying string into one. Durations are seconds.
 */

/** A half-open-ish interval `[timestamp, timestamp + duration]`. */
export interface Interval {
  readonly timestamp: Date;
  readonly duration: number; // seconds, >= 0
}

/** Query bounds; either side may be left open. */
export interface TimeRange {
  readonly start?: Date | undefined;
  readonly end?: Date | undefined;
}

/** Half-open window `[from, to)` over point timestamps. */
export interface DayWindow {
  readonly from: Date;
  readonly to: Date;
}

const MS_PER_SECOND = 1000;
const MS_PER_DAY = 86_400_000;

/**
 * Normalises an instant to a UTC `Date`.
 * Strings must be ISO-8601 with `Z` or an explicit offset.
 */
export function toUtc(value: Date | string): Date {
  const date = typeof value === 'string' ? new Date(value) : new Date(value.getTime());
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError([{ path: 'timestamp', message: `Invalid instant: ${String(value)}` }]);
  }
  return date;
}

export function intervalEnd(interval: Interval): Date {
  return new Date(interval.timestamp.getTime() + interval.duration * MS_PER_SECOND);
}

/**
 * True iff the interval intersects the range. Endpoints touch-count as overlap.
 */
export function overlaps(interval: Interval, range: TimeRange): boolean {
  if (range.end !== undefined && interval.timestamp.getTime() > range.end.getTime()) {
    return false;
  }
  if (range.start !== undefined && intervalEnd(interval).getTime() < range.start.getTime()) {
    return false;
  }
  return true;
}

/**
 * Trims an interval so it lies within the range. Returns a copy; every
 * other property (id, data, ...) is carried over untouched.
 */
export function clip<T extends Interval>(interval: T, range: TimeRange): T {
  let timestamp = interval.timestamp;
  let duration = interval.duration;

  if (range.start !== undefined && timestamp.getTime() < range.start.getTime()) {
    const endMs = timestamp.getTime() + duration * MS_PER_SECOND;
    timestamp = new Date(range.start.getTime());
    duration = (endMs - timestamp.getTime()) / MS_PER_SECOND;
  }
  if (range.end !== undefined && timestamp.getTime() + duration * MS_PER_SECOND > range.end.getTime()) {
    duration = (range.end.getTime() - timestamp.getTime()) / MS_PER_SECOND;
  }

  return { ...interval, timestamp, duration };
}

/** The UTC calendar day containing `date`. */
export function utcDay(date: Date): DayWindow {
  const from = Math.floor(date.getTime() / MS_PER_DAY) * MS_PER_DAY;
  return { from: new Date(from), to: new Date(from + MS_PER_DAY) };
}

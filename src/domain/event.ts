/**
 * Core domain types for the interval event model.
 *
 * These types define the canonical shape of an event as it flows
 * through the store. They carry no framework dependencies.
 */

import type { Interval } from './time.js';

/** Opaque key/value payload. The store transports it, never reads it. */
export type EventData = Record<string, unknown>;

/** Backend-assigned event identifier, opaque to callers. */
export type EventId = string;

/** The mutable part of an event: what `replace` overwrites. */
export interface EventBody extends Interval {
  readonly data: EventData;
}

/** An event that has not been stored yet. */
export interface PendingEvent extends EventBody {
  readonly kind: 'pending';
}

/**
 * An event the backend has stored. `id` never changes for the life
 * of the event.
 */
export interface PersistedEvent extends EventBody {
  readonly kind: 'persisted';
  readonly id: EventId;
}

export type Event = PendingEvent | PersistedEvent;

export function pendingEvent(body: EventBody): PendingEvent {
  return { kind: 'pending', timestamp: body.timestamp, duration: body.duration, data: body.data };
}

export function persistedEvent(id: EventId, body: EventBody): PersistedEvent {
  return { kind: 'persisted', id, timestamp: body.timestamp, duration: body.duration, data: body.data };
}

/** Strips identity, leaving only what a write stores. */
export function eventBody(event: EventBody): EventBody {
  return { timestamp: event.timestamp, duration: event.duration, data: event.data };
}

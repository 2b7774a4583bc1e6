import { vi } from 'vitest';
import { pendingEvent } from '../src/domain/index.js';
import type { EventData, PendingEvent } from '../src/domain/index.js';
import type { CreateBucketInput } from '../src/application/index.js';

/** pino stand-in; `child()` hands back the same spies. */
export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as import('pino').Logger;
}

/** Epoch seconds → Date, so interval arithmetic in tests stays readable. */
export function at(seconds: number): Date {
  return new Date(seconds * 1000);
}

export function pending(seconds: number, duration: number, data: EventData = {}): PendingEvent {
  return pendingEvent({ timestamp: at(seconds), duration, data });
}

export function bucketInput(id: string, overrides: Partial<CreateBucketInput> = {}): CreateBucketInput {
  return {
    id,
    type: overrides.type ?? 'currentwindow',
    client: overrides.client ?? 'test-client',
    hostname: overrides.hostname ?? 'test-host',
    created: overrides.created ?? new Date('2026-02-18T12:00:00Z'),
    name: overrides.name,
  };
}

/** Mutable millisecond clock for cache and day-boundary tests. */
export function manualClock(start: number) {
  let now = start;
  return {
    now: () => now,
    set: (ms: number) => {
      now = ms;
    },
    advance: (ms: number) => {
      now += ms;
    },
  };
}

import { describe, it, expect, vi, beforeEach } from 'vitest';

/**
 * The repositories and migration are replaced with stubs so the backend's
 * own work (key parsing, error translation, lifecycle) is tested without
 * a database.
 */
vi.mock('../../src/infrastructure/db/migrate.js', () => ({
  ensureSchema: vi.fn(),
}));
vi.mock('../../src/infrastructure/db/bucket-repository.js', () => ({
  findAllBuckets: vi.fn(),
  findBucketById: vi.fn(),
  insertBucket: vi.fn(),
  deleteBucketByKey: vi.fn(),
}));
vi.mock('../../src/infrastructure/db/event-repository.js', () => ({
  countEvents: vi.fn(),
  deleteEvent: vi.fn(),
  findEventById: vi.fn(),
  findLastEvent: vi.fn(),
  insertEvent: vi.fn(),
  insertEvents: vi.fn(),
  queryEvents: vi.fn(),
  updateEvent: vi.fn(),
}));
vi.mock('../../src/infrastructure/db/user-repository.js', () => ({
  findAllUsers: vi.fn(),
  findUserByEmail: vi.fn(),
  findUsersUsedSince: vi.fn(),
  replaceUser: vi.fn(),
}));
vi.mock('../../src/infrastructure/db/report-repository.js', () => ({
  findReport: vi.fn(),
  replaceReport: vi.fn(),
}));

import { PostgresBackend, isConnectionError } from '../../src/infrastructure/db/postgres-backend.js';
import type { PostgresClient } from '../../src/infrastructure/db/postgres-backend.js';
import { parseSerial } from '../../src/infrastructure/db/keys.js';
import { ensureSchema } from '../../src/infrastructure/db/migrate.js';
import { findBucketById } from '../../src/infrastructure/db/bucket-repository.js';
import { deleteEvent, findEventById, queryEvents, updateEvent } from '../../src/infrastructure/db/event-repository.js';
import { BackendUnavailableError } from '../../src/domain/index.js';
import { at, fakeLogger } from '../helpers.js';

const mockEnsureSchema = vi.mocked(ensureSchema);
const mockFindBucketById = vi.mocked(findBucketById);
const mockFindEventById = vi.mocked(findEventById);
const mockQueryEvents = vi.mocked(queryEvents);
const mockUpdateEvent = vi.mocked(updateEvent);
const mockDeleteEvent = vi.mocked(deleteEvent);

function refused(): Error {
  return Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:5432'), { code: 'ECONNREFUSED' });
}

/** postgres.js stand-in: callable as a tagged template, plus `end()`. */
function fakeClient() {
  const sql = Object.assign(vi.fn().mockResolvedValue([]), { end: vi.fn().mockResolvedValue(undefined) });
  const db = {};
  return { sql, db, client: { sql, db } as unknown as PostgresClient };
}

describe('PostgresBackend', () => {
  let fake: ReturnType<typeof fakeClient>;
  let backend: PostgresBackend;

  beforeEach(() => {
    vi.clearAllMocks();
    fake = fakeClient();
    backend = new PostgresBackend(fake.client, fakeLogger());
  });

  // ─── lifecycle ─────────────────────────────────────────────

  it('checks the server and ensures the schema on connect', async () => {
    await backend.connect();

    expect(fake.sql).toHaveBeenCalledTimes(1);
    expect(mockEnsureSchema).toHaveBeenCalledWith(fake.client.sql);
  });

  it('reports an unreachable server as BackendUnavailableError', async () => {
    fake.sql.mockRejectedValueOnce(refused());

    await expect(backend.connect()).rejects.toBeInstanceOf(BackendUnavailableError);
    expect(mockEnsureSchema).not.toHaveBeenCalled();
  });

  it('ends the pool on close', async () => {
    await backend.close();
    expect(fake.sql.end).toHaveBeenCalledWith({ timeout: 5 });
  });

  // ─── error translation ─────────────────────────────────────

  it('translates a dropped connection during a query', async () => {
    mockFindBucketById.mockRejectedValueOnce(refused());

    const err = await backend.findBucket('b1').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(BackendUnavailableError);
    expect(err instanceof BackendUnavailableError && err.operation).toBe('findBucket');
  });

  it('lets query errors through untouched', async () => {
    const syntax = Object.assign(new Error('syntax error at or near "FROM"'), { code: '42601' });
    mockFindBucketById.mockRejectedValueOnce(syntax);

    await expect(backend.findBucket('b1')).rejects.toBe(syntax);
  });

  // ─── keys ──────────────────────────────────────────────────

  it('passes numeric keys to the repositories', async () => {
    mockFindEventById.mockResolvedValueOnce(undefined);
    mockQueryEvents.mockResolvedValueOnce([]);

    await backend.findEvent('7', '42');
    await backend.findEvents('7', { start: at(100) }, 10);

    expect(mockFindEventById).toHaveBeenCalledWith(fake.db, 7, 42);
    expect(mockQueryEvents).toHaveBeenCalledWith(fake.db, 7, { start: at(100) }, 10);
  });

  it('treats an id that cannot be a serial as missing', async () => {
    await expect(backend.findEvent('7', 'abc')).resolves.toBeUndefined();
    await expect(backend.updateEvent('7', '0', { timestamp: at(1), duration: 0, data: {} })).resolves.toBeUndefined();
    await expect(backend.deleteEvent('7', '-1')).resolves.toBe(false);

    expect(mockFindEventById).not.toHaveBeenCalled();
    expect(mockUpdateEvent).not.toHaveBeenCalled();
    expect(mockDeleteEvent).not.toHaveBeenCalled();
  });

  it('rejects a malformed bucket key', async () => {
    await expect(backend.countEvents('not-a-key', {})).rejects.toThrow('Malformed bucket key "not-a-key"');
  });
});

describe('isConnectionError', () => {
  it('matches transport error codes', () => {
    expect(isConnectionError(refused())).toBe(true);
    expect(isConnectionError(Object.assign(new Error('timeout'), { code: 'CONNECT_TIMEOUT' }))).toBe(true);
  });

  it('looks through wrapped causes', () => {
    expect(isConnectionError(new Error('query failed', { cause: refused() }))).toBe(true);
  });

  it('ignores other errors', () => {
    expect(isConnectionError(new Error('plain'))).toBe(false);
    expect(isConnectionError(Object.assign(new Error('unique'), { code: '23505' }))).toBe(false);
    expect(isConnectionError('ECONNREFUSED')).toBe(false);
  });
});

describe('parseSerial', () => {
  it('accepts positive decimal integers', () => {
    expect(parseSerial('1')).toBe(1);
    expect(parseSerial('9007199254740991')).toBe(9007199254740991);
  });

  it('rejects everything else', () => {
    expect(parseSerial('0')).toBeUndefined();
    expect(parseSerial('01')).toBeUndefined();
    expect(parseSerial('1.5')).toBeUndefined();
    expect(parseSerial('abc')).toBeUndefined();
    expect(parseSerial('9007199254740993')).toBeUndefined();
  });
});

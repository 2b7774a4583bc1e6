import { utcDay } from '../domain/index.js';
import type { CredentialRecord } from '../domain/index.js';
import type { StorageBackend } from './storage-backend.js';

/**
 * Answers "who has been active since X" from the `last_used_at` stamp
 * written by `CredentialStore.save`.
 */
export class UsageTracker {
  constructor(
    private readonly backend: StorageBackend,
    private readonly clock: () => number = Date.now,
  ) {}

  /** Defaults to the start of the current UTC day. */
  async listSince(threshold?: Date): Promise<CredentialRecord[]> {
    const since = threshold ?? utcDay(new Date(this.clock())).from;
    return this.backend.listCredentialsUsedSince(since);
  }
}

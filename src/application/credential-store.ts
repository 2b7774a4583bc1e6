import type { Logger } from 'pino';
import type { CredentialRecord } from '../domain/index.js';
import type { StorageBackend } from './storage-backend.js';
import { credentialFilterSchema, credentialInputSchema } from './record-schema.js';
import type { CredentialFilter, CredentialInput } from './record-schema.js';
import { parseWith } from './validation.js';

/**
 * Device credentials keyed by email.
 *
 * `save` is a full replace: whatever was stored under the email is
 * deleted and the new record inserted with a fresh `last_used_at`.
 */
export class CredentialStore {
  constructor(
    private readonly backend: StorageBackend,
    private readonly log: Logger,
    private readonly clock: () => number = Date.now,
  ) {}

  async save(input: CredentialInput): Promise<CredentialRecord> {
    const record = parseWith(credentialInputSchema, input);
    const saved = await this.backend.replaceCredential({
      ...record,
      last_used_at: new Date(this.clock()),
    });
    this.log.info({ email: saved.email, deviceId: saved.device_id }, 'Credential saved');
    return saved;
  }

  async get(filter: CredentialFilter): Promise<CredentialRecord | null> {
    const { email } = parseWith(credentialFilterSchema, filter);
    const record = await this.backend.findCredential(email);
    return record ?? null;
  }

  async list(): Promise<CredentialRecord[]> {
    return this.backend.listCredentials();
  }
}

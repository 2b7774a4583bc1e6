import { persistedEvent } from '../../domain/index.js';
import type { BucketRow, CredentialRecord, PersistedEvent, ReportRecord } from '../../domain/index.js';
import type { BucketDoc, EventDoc, ReportDoc, UserDoc } from './models.js';

export function toBucketRow(doc: BucketDoc): BucketRow {
  return {
    key: doc._id.toHexString(),
    id: doc.bucket_id,
    name: doc.name ?? null,
    type: doc.type,
    client: doc.client,
    hostname: doc.hostname,
    created: doc.created,
  };
}

export function toEvent(doc: EventDoc): PersistedEvent {
  return persistedEvent(doc._id.toHexString(), {
    timestamp: doc.timestamp,
    duration: doc.duration,
    data: doc.data ?? {},
  });
}

export function toCredential(doc: UserDoc): CredentialRecord {
  return {
    device_id: doc.device_id,
    name: doc.name,
    email: doc.email,
    access_token: doc.access_token,
    refresh_token: doc.refresh_token,
    last_used_at: doc.last_used_at ?? null,
  };
}

export function toReport(doc: ReportDoc): ReportRecord {
  return {
    email: doc.email,
    spent_time: doc.spent_time,
    call_time: doc.call_time,
    date: doc.date,
    wfh: doc.wfh,
  };
}

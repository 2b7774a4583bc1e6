import type { Logger } from 'pino';
import { utcDay } from '../domain/index.js';
import type { Report, ReportRecord } from '../domain/index.js';
import type { StorageBackend } from './storage-backend.js';
import { reportInputSchema } from './record-schema.js';
import type { ReportInput } from './record-schema.js';
import { parseWith } from './validation.js';

/**
 * One report per email per UTC day. Saving again on the same day
 * replaces the earlier report.
 */
export class ReportStore {
  constructor(
    private readonly backend: StorageBackend,
    private readonly log: Logger,
    private readonly clock: () => number = Date.now,
  ) {}

  async save(input: ReportInput): Promise<ReportRecord> {
    const record = parseWith(reportInputSchema, input);
    const saved = await this.backend.replaceReport(record, utcDay(record.date));
    this.log.info({ email: saved.email, date: saved.date.toISOString() }, 'Report saved');
    return saved;
  }

  async get(email: string, day?: Date): Promise<Report | null> {
    const window = utcDay(day ?? new Date(this.clock()));
    const record = await this.backend.findReport(email, window);
    if (!record) {
      return null;
    }
    return { ...record, active_time: record.spent_time + record.call_time };
  }
}

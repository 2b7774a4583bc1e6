/**
 * Auxiliary records stored beside the event data.
 *
 * Each has a natural key; saving replaces the whole record under that key.
 */

/** Device credentials, keyed by `email`. */
export interface CredentialRecord {
  readonly device_id: string;
  readonly name: string;
  readonly email: string;
  readonly access_token: string;
  readonly refresh_token: string;
  readonly last_used_at: Date | null;
}

/** Daily activity report, keyed by `email` + UTC day of `date`. */
export interface ReportRecord {
  readonly email: string;
  readonly spent_time: number; // seconds
  readonly call_time: number; // seconds
  readonly date: Date;
  readonly wfh: boolean;
}

/** A report as read back, with the derived total. */
export interface Report extends ReportRecord {
  readonly active_time: number;
}

import { z } from 'zod';
import { instantSchema } from './event-schema.js';

/**
 * Credential record as supplied by the caller. `last_used_at` is stamped
 * by the store on save, so it is not accepted here.
 */
export const credentialInputSchema = z.object({
  device_id: z.string().min(1).max(255),
  name: z.string().max(255),
  email: z.string().email(),
  access_token: z.string().max(4096),
  refresh_token: z.string().max(4096),
});

export type CredentialInput = z.input<typeof credentialInputSchema>;

export const credentialFilterSchema = z.object({
  email: z.string().email(),
});

export type CredentialFilter = z.input<typeof credentialFilterSchema>;

/** Daily report. Times are seconds. */
export const reportInputSchema = z.object({
  email: z.string().email(),
  spent_time: z.number().finite().nonnegative(),
  call_time: z.number().finite().nonnegative(),
  date: instantSchema,
  wfh: z.boolean(),
});

export type ReportInput = z.input<typeof reportInputSchema>;

/**
 * Payloads exchanged on the speed queue.
 */

import { z } from 'zod';
import { REPORT_TYPES } from '../report/types.js';

export const storageReferenceSchema = z.object({
  provider: z.string(),
  bucket: z.string(),
  key: z.string(),
  url: z.string(),
  contentHash: z.string(),
  sizeBytes: z.number().int().nonnegative(),
  versionId: z.string().optional(),
});

/** `ok` payload of a measurement call */
export const measurementReplySchema = z.object({
  reference: storageReferenceSchema,
  fileName: z.string(),
  period: z.object({
    type: z.enum(REPORT_TYPES),
    start: z.string(),
    end: z.string(),
  }),
});

export type MeasurementReply = z.infer<typeof measurementReplySchema>;

/** Reason used when the Worker's output could not be stored */
export type MeasurementFailureReason =
  | 'invalid_request'
  | 'worker_error'
  | 'storage_exhausted'
  | 'content_rejected'
  | 'storage_conflict';

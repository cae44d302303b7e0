/**
 * Types for the report module.
 *
 * The Worker turns a measurement request into a spreadsheet fetched from
 * the companion report service.
 */

import { z } from 'zod';

export const REPORT_TYPES = [
  'day',
  'week',
  'month',
  'current_week',
  'last_week',
  'current_month',
  'last_month',
  'date_range',
] as const;

export type ReportType = (typeof REPORT_TYPES)[number];

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

/** Payload of a call on the speed queue */
export const measureRequestSchema = z.object({
  op: z.literal('measure'),
  reportType: z.enum(REPORT_TYPES).default('day'),
  startDate: isoDate.optional(),
  endDate: isoDate.optional(),
});

export type MeasureRequest = z.output<typeof measureRequestSchema>;

/** What callers send; `reportType` may be omitted */
export type MeasureRequestInput = z.input<typeof measureRequestSchema>;

/** Inclusive date range of a report, as YYYY-MM-DD */
export interface ReportPeriod {
  type: ReportType;
  start: string;
  end: string;
}

export interface ReportMetadata {
  fileName: string;
  period: ReportPeriod;
  contentType: string;
}

/** Output of a successful Worker run */
export interface WorkerResult {
  content: Buffer;
  metadata: ReportMetadata;
}

/** The Worker contract the measurement handler depends on */
export interface ReportWorker {
  execute(request: MeasureRequest): Promise<WorkerResult>;
}

export type ReportErrorCode =
  | 'invalid_period'
  | 'http_error'
  | 'empty_report'
  | 'timeout'
  | 'network';

/** A Worker failure */
export class ReportError extends Error {
  override readonly name = 'ReportError';

  readonly code: ReportErrorCode;

  constructor(code: ReportErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
  }
}

export { SpeedReportWorker } from './speed-report-worker.js';
export type { SpeedReportWorkerOptions } from './speed-report-worker.js';
export { resolveReportPeriod, reportFileName, parseIsoDate, formatDate } from './report-dates.js';
export { ReportError, REPORT_TYPES, measureRequestSchema } from './types.js';
export type {
  ReportType,
  MeasureRequest,
  MeasureRequestInput,
  ReportPeriod,
  ReportMetadata,
  WorkerResult,
  ReportWorker,
  ReportErrorCode,
} from './types.js';

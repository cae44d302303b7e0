export { SpeedClient, formatOutcome } from './speed-client.js';
export type {
  ReportOutcome,
  ReportRequest,
  RequestReportOptions,
  SpeedClientOptions,
} from './speed-client.js';

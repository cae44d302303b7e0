/**
 * Speed report Worker.
 *
 * Resolves the requested period and downloads the spreadsheet for it from
 * the companion report service:
 *   GET {baseUrl}{reportPath}?start_date=YYYY-MM-DD&end_date=YYYY-MM-DD
 *
 * @module report/speed-report-worker
 */

import type { Logger } from 'pino';
import { errorMessage } from '@speed-rpc/broker-rpc';
import { reportFileName, resolveReportPeriod } from './report-dates.js';
import { ReportError } from './types.js';
import type { MeasureRequest, ReportWorker, WorkerResult } from './types.js';

const XLSX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export interface SpeedReportWorkerOptions {
  /** Companion service base URL, e.g. http://localhost:8010 */
  baseUrl: string;

  /** Path of the report endpoint (default: /analysis/report) */
  reportPath?: string;

  /** Per-request timeout in ms (default: 60000) */
  timeoutMs?: number;

  logger: Logger;

  /** Custom fetch (for testing) */
  fetchFn?: typeof fetch;

  /** Clock (for testing) */
  now?: () => Date;
}

export class SpeedReportWorker implements ReportWorker {
  private readonly baseUrl: string;
  private readonly reportPath: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly fetchFn: typeof fetch;
  private readonly now: () => Date;

  constructor(options: SpeedReportWorkerOptions) {
    this.baseUrl = options.baseUrl;
    this.reportPath = options.reportPath ?? '/analysis/report';
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.logger = options.logger.child({ component: 'speed-report-worker' });
    this.fetchFn = options.fetchFn ?? globalThis.fetch;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Fetch the report for a request.
   *
   * @throws ReportError on an invalid period, a failed or empty response,
   *   or a timeout.
   */
  async execute(request: MeasureRequest): Promise<WorkerResult> {
    const period = resolveReportPeriod(request.reportType, this.now(), request);
    const url = this.reportUrl(period.start, period.end);
    const startedAt = Date.now();

    this.logger.info(
      { reportType: period.type, start: period.start, end: period.end },
      'Fetching report',
    );

    let response: Response;
    try {
      response = await this.fetchFn(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (err) {
      if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
        throw new ReportError(
          'timeout',
          `Report service did not answer within ${this.timeoutMs}ms`,
          { cause: err },
        );
      }
      throw new ReportError('network', `Report service unreachable: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    if (!response.ok) {
      throw new ReportError(
        'http_error',
        `Report service responded ${response.status} ${response.statusText}`.trim(),
      );
    }

    const content = Buffer.from(await response.arrayBuffer());
    if (content.length === 0) {
      throw new ReportError('empty_report', `Report for ${period.start}..${period.end} is empty`);
    }

    const fileName = reportFileName(period);
    this.logger.info(
      { fileName, size: content.length, durationMs: Date.now() - startedAt },
      'Report fetched',
    );

    return {
      content,
      metadata: {
        fileName,
        period,
        contentType: response.headers.get('content-type') ?? XLSX_CONTENT_TYPE,
      },
    };
  }

  private reportUrl(start: string, end: string): string {
    const url = new URL(this.reportPath, this.baseUrl);
    url.searchParams.set('start_date', start);
    url.searchParams.set('end_date', end);
    return url.toString();
  }
}

import { describe, it, expect } from 'vitest';
import { SpeedReportWorker } from '../report/speed-report-worker.js';
import { ReportError } from '../report/types.js';
import { fakeFetch, silentLogger } from './helpers/index.js';

const NOW = new Date('2024-05-15T10:00:00Z');

function worker(fetchFn: typeof fetch, timeoutMs?: number) {
  return new SpeedReportWorker({
    baseUrl: 'http://reports.test:8010',
    logger: silentLogger(),
    fetchFn,
    timeoutMs,
    now: () => NOW,
  });
}

async function reportError(promise: Promise<unknown>): Promise<ReportError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof ReportError) return err;
    throw err;
  }
  throw new Error('expected a ReportError');
}

describe('SpeedReportWorker', () => {
  it('fetches the report for the resolved period', async () => {
    const { fetchFn, calls } = fakeFetch(
      () =>
        new Response('xlsx-bytes', {
          status: 200,
          headers: { 'content-type': 'application/test' },
        }),
    );

    const result = await worker(fetchFn).execute({ op: 'measure', reportType: 'week' });

    expect(calls.map((c) => c.url)).toEqual([
      'http://reports.test:8010/analysis/report?start_date=2024-05-09&end_date=2024-05-15',
    ]);
    expect(result.content.toString()).toBe('xlsx-bytes');
    expect(result.metadata).toEqual({
      fileName: 'report_from 2024-05-09_to_2024-05-15.xlsx',
      period: { type: 'week', start: '2024-05-09', end: '2024-05-15' },
      contentType: 'application/test',
    });
  });

  it('passes an explicit date range through', async () => {
    const { fetchFn, calls } = fakeFetch(() => new Response('x'));

    await worker(fetchFn).execute({
      op: 'measure',
      reportType: 'date_range',
      startDate: '2024-01-01',
      endDate: '2024-01-31',
    });

    expect(calls[0]?.url).toBe(
      'http://reports.test:8010/analysis/report?start_date=2024-01-01&end_date=2024-01-31',
    );
  });

  it('raises http_error for a non-2xx response', async () => {
    const { fetchFn } = fakeFetch(
      () => new Response('nope', { status: 502, statusText: 'Bad Gateway' }),
    );

    const err = await reportError(worker(fetchFn).execute({ op: 'measure', reportType: 'day' }));

    expect(err.code).toBe('http_error');
    expect(err.message).toBe('Report service responded 502 Bad Gateway');
  });

  it('raises empty_report for an empty body', async () => {
    const { fetchFn } = fakeFetch(() => new Response(''));

    const err = await reportError(worker(fetchFn).execute({ op: 'measure', reportType: 'day' }));

    expect(err.code).toBe('empty_report');
    expect(err.message).toBe('Report for 2024-05-15..2024-05-15 is empty');
  });

  it('raises network when the service is unreachable', async () => {
    const fetchFn: typeof fetch = async () => {
      throw new TypeError('fetch failed');
    };

    const err = await reportError(worker(fetchFn).execute({ op: 'measure', reportType: 'day' }));

    expect(err.code).toBe('network');
    expect(err.message).toBe('Report service unreachable: fetch failed');
  });

  it('raises timeout when the service does not answer in time', async () => {
    const fetchFn: typeof fetch = (_input, init) =>
      new Promise<Response>((_, reject) => {
        const signal = init?.signal;
        if (!signal) return;
        signal.addEventListener('abort', () => {
          reject(signal.reason);
        });
      });

    const slow = worker(fetchFn, 20);
    const err = await reportError(slow.execute({ op: 'measure', reportType: 'day' }));

    expect(err.code).toBe('timeout');
    expect(err.message).toBe('Report service did not answer within 20ms');
  });

  it('raises invalid_period before fetching', async () => {
    const { fetchFn, calls } = fakeFetch(() => new Response('x'));

    const err = await reportError(
      worker(fetchFn).execute({ op: 'measure', reportType: 'date_range' }),
    );

    expect(err.code).toBe('invalid_period');
    expect(calls).toHaveLength(0);
  });
});

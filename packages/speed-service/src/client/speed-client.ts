/**
 * Speed Client
 *
 * What a front end calls to get a report. Wraps an RpcClient and maps its
 * outcomes onto ReportOutcome, keeping "your request failed" (the worker
 * answered) apart from "the system could not process it" (no answer).
 *
 * @module client/speed-client
 */

import type { Logger } from 'pino';
import type { OutageMonitor, RpcClient } from '@speed-rpc/broker-rpc';
import type { MeasureRequestInput, ReportPeriod } from '../report/types.js';
import { measurementReplySchema } from '../app/types.js';
import type { MeasurementReply } from '../app/types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A report request as the front end states it */
export type ReportRequest = Omit<MeasureRequestInput, 'op'>;

export type ReportOutcome =
  | {
      status: 'ready';
      correlationId: string;
      url: string;
      fileName: string;
      period: ReportPeriod;
      reference: MeasurementReply['reference'];
    }
  | { status: 'failed'; correlationId: string; reason: string; message: string }
  | { status: 'timeout'; correlationId: string; timeoutMs: number }
  | { status: 'unavailable'; correlationId: string; message: string }
  | { status: 'cancelled'; correlationId: string };

export interface SpeedClientOptions {
  logger: Logger;

  /** Call timeout (default: the RpcClient's) */
  timeoutMs?: number;

  /**
   * Told when calls go unanswered and when answers resume. Keep it apart
   * from the RpcClient's publish monitor: a reachable broker with no
   * worker behind it is a different outage.
   */
  monitor?: OutageMonitor;
}

export interface RequestReportOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// SpeedClient
// ---------------------------------------------------------------------------

export class SpeedClient {
  private readonly client: RpcClient;
  private readonly timeoutMs?: number;
  private readonly monitor?: OutageMonitor;
  private readonly logger: Logger;

  constructor(client: RpcClient, options: SpeedClientOptions) {
    this.client = client;
    this.timeoutMs = options.timeoutMs;
    this.monitor = options.monitor;
    this.logger = options.logger.child({ component: 'speed-client' });
  }

  async requestReport(
    request: ReportRequest = {},
    options: RequestReportOptions = {},
  ): Promise<ReportOutcome> {
    const outcome = await this.client.call(
      { ...request, op: 'measure' },
      {
        timeoutMs: options.timeoutMs ?? this.timeoutMs,
        signal: options.signal,
        decode: (payload) => measurementReplySchema.parse(payload),
      },
    );
    const { correlationId } = outcome;

    switch (outcome.status) {
      case 'ok': {
        this.monitor?.recordSuccess();
        const { reference, fileName, period } = outcome.payload;
        this.logger.info({ correlationId, key: reference.key }, 'Report ready');
        return { status: 'ready', correlationId, url: reference.url, fileName, period, reference };
      }
      case 'failed':
        this.monitor?.recordSuccess();
        this.logger.warn({ correlationId, reason: outcome.reason }, 'Report request failed');
        return {
          status: 'failed',
          correlationId,
          reason: outcome.reason,
          message: outcome.message,
        };
      case 'timeout':
        this.monitor?.recordFailure(new Error(`No reply within ${outcome.timeoutMs}ms`), {
          correlationId,
        });
        this.logger.warn(
          { correlationId, timeoutMs: outcome.timeoutMs },
          'Report request timed out',
        );
        return { status: 'timeout', correlationId, timeoutMs: outcome.timeoutMs };
      case 'unavailable':
        this.logger.warn({ correlationId, message: outcome.message }, 'Report request not sent');
        return { status: 'unavailable', correlationId, message: outcome.message };
      case 'cancelled':
        return { status: 'cancelled', correlationId };
    }
  }
}

/**
 * Short plain-text message for a user-facing layer.
 */
export function formatOutcome(outcome: ReportOutcome): string {
  switch (outcome.status) {
    case 'ready':
      return `Report ready: ${outcome.fileName}\n${outcome.url}`;
    case 'failed':
      return `Your request failed (${outcome.reason}): ${outcome.message}`;
    case 'timeout':
      return 'The system could not process your request in time. Please try again later.';
    case 'unavailable':
      return 'The system is unavailable right now. Please try again later.';
    case 'cancelled':
      return 'Request cancelled.';
  }
}

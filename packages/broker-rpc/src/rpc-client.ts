/**
 * RPC Client
 *
 * Turns "publish a request, wait for the matching reply" into a single
 * awaitable call. One exclusive reply queue is created per client and
 * shared by all of its calls; replies are routed back by correlation id
 * through the PendingCallTable.
 *
 * Once accepted, a call settles with a CallOutcome, never a rejection:
 * - ok / failed: the server replied
 * - timeout: no reply before the deadline
 * - unavailable: the request could not be published
 * - cancelled: the owner gave up (signal, cancel(), close())
 *
 * Misuse is rejected before anything is sent: calling before start(), and
 * InvalidCallError for a non-positive timeout or an explicit correlation id
 * that is still outstanding.
 *
 * @module rpc-client
 */

import type { Logger } from 'pino';
import type { ConsumerHandle, Delivery, MessageProperties, Transport } from './transport/types.js';
import type { CallOutcome } from './types.js';
import { decodeResult, encodeCall } from './envelope.js';
import { InvalidCallError, errorMessage } from './errors.js';
import { generateCorrelationId } from './ids.js';
import { PendingCallTable } from './pending-calls.js';
import { ExponentialBackoff, RetryExhaustedError, retry } from './retry-policy.js';
import type { RetryPolicy, SleepFn } from './retry-policy.js';
import type { OutageMonitor } from './outage-monitor.js';
import {
  DEFAULT_CALL_TIMEOUT_MS,
  DEFAULT_REQUEST_QUEUE,
  REASON_INVALID_REPLY,
} from './constants.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Client lifecycle states */
export type ClientState = 'idle' | 'ready' | 'closed';

/** Options for RpcClient */
export interface RpcClientOptions {
  /** Request queue calls are published to (default: rpc_queue) */
  queueName?: string;

  /** Timeout for calls that do not set one (default: 2 min) */
  defaultTimeoutMs?: number;

  /** Retry policy for request publishes, bounded by each call's deadline */
  publishPolicy?: RetryPolicy;

  /** Declare the durable request queue on start (default: true) */
  declareRequestQueue?: boolean;

  /** Told about request publish failures and successes */
  monitor?: OutageMonitor;

  logger: Logger;
  sleep?: SleepFn;
}

/** Per-call options */
export interface CallOptions {
  /** Milliseconds to wait for the reply */
  timeoutMs?: number;

  /** Aborting settles the call as `cancelled` */
  signal?: AbortSignal;

  /** Correlation id to use instead of a generated one */
  correlationId?: string;
}

/** Per-call options with a reply decoder */
export interface DecodedCallOptions<R> extends CallOptions {
  /**
   * Validate the reply payload. A throw turns the outcome into
   * `failed` with reason `invalid_reply`.
   */
  decode: (payload: unknown) => R;
}

// ---------------------------------------------------------------------------
// RpcClient
// ---------------------------------------------------------------------------

/**
 * @example
 * ```ts
 * const client = new RpcClient(transport, { logger });
 * await client.start();
 * const outcome = await client.call({ op: 'measure' }, { timeoutMs: 60_000 });
 * if (outcome.status === 'ok') console.log(outcome.payload);
 * await client.close();
 * ```
 */
export class RpcClient {
  readonly queueName: string;
  private readonly transport: Transport;
  private readonly defaultTimeoutMs: number;
  private readonly publishPolicy: RetryPolicy;
  private readonly declareRequestQueue: boolean;
  private readonly monitor?: OutageMonitor;
  private readonly logger: Logger;
  private readonly sleep?: SleepFn;
  private readonly table = new PendingCallTable();

  private _state: ClientState = 'idle';
  private replyQueue: string | null = null;
  private consumer: ConsumerHandle | null = null;
  private discarded = 0;

  private readonly onTransportClose = (): void => {
    if (this._state !== 'ready') return;
    this._state = 'closed';
    const failed = this.table.failAll('Broker connection closed');
    this.logger.warn({ failed }, 'Broker connection closed, failing outstanding calls');
  };

  constructor(transport: Transport, options: RpcClientOptions) {
    this.transport = transport;
    this.queueName = options.queueName ?? DEFAULT_REQUEST_QUEUE;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
    this.publishPolicy =
      options.publishPolicy ?? new ExponentialBackoff({ maxAttempts: 5, baseDelayMs: 200 });
    this.declareRequestQueue = options.declareRequestQueue ?? true;
    this.monitor = options.monitor;
    this.logger = options.logger.child({ component: 'rpc-client', queue: this.queueName });
    this.sleep = options.sleep;
  }

  get state(): ClientState {
    return this._state;
  }

  /** Reply queue shared by this client's calls, once started */
  get replyTo(): string | null {
    return this.replyQueue;
  }

  /** Calls waiting for a reply */
  get pendingCount(): number {
    return this.table.size;
  }

  /** Replies dropped because no call was waiting for them */
  get discardedReplies(): number {
    return this.discarded;
  }

  /**
   * Create the reply queue and start listening on it.
   */
  async start(): Promise<void> {
    if (this._state !== 'idle') {
      throw new Error(`Cannot start from state: ${this._state}`);
    }

    if (this.declareRequestQueue) {
      await this.transport.assertQueue(this.queueName, { durable: true });
    }
    const replyQueue = await this.transport.createReplyQueue();
    this.consumer = await this.transport.consume(
      replyQueue,
      (delivery) => {
        this.handleReply(delivery);
      },
      { noAck: true },
    );
    this.replyQueue = replyQueue;
    this.transport.on('close', this.onTransportClose);
    this._state = 'ready';
    this.logger.info({ replyQueue }, 'RPC client ready');
  }

  /**
   * Invoke the remote operation and wait for its outcome.
   *
   * @throws InvalidCallError if `timeoutMs` is not a positive number or
   *   `correlationId` names a call that has not settled yet.
   */
  call<R>(payload: unknown, options: DecodedCallOptions<R>): Promise<CallOutcome<R>>;
  call(payload: unknown, options?: CallOptions): Promise<CallOutcome>;
  async call<R>(
    payload: unknown,
    options: CallOptions & { decode?: (payload: unknown) => R } = {},
  ): Promise<CallOutcome<R> | CallOutcome> {
    const outcome = await this.dispatch(payload, options);
    const decode = options.decode;
    if (!decode || outcome.status !== 'ok') {
      return outcome;
    }

    try {
      return { ...outcome, payload: decode(outcome.payload) };
    } catch (err) {
      this.logger.warn(
        { correlationId: outcome.correlationId, error: errorMessage(err) },
        'Reply payload rejected',
      );
      return {
        status: 'failed',
        correlationId: outcome.correlationId,
        reason: REASON_INVALID_REPLY,
        message: errorMessage(err),
      };
    }
  }

  /**
   * Cancel an outstanding call. The server may still process it.
   *
   * @returns false if the call already settled.
   */
  cancel(correlationId: string): boolean {
    const cancelled = this.table.cancel(correlationId);
    if (cancelled) {
      this.logger.debug({ correlationId }, 'Call cancelled');
    }
    return cancelled;
  }

  /**
   * Cancel every outstanding call and remove the reply queue.
   */
  async close(): Promise<void> {
    if (this._state === 'closed') return;
    const wasReady = this._state === 'ready';
    this._state = 'closed';
    this.transport.off('close', this.onTransportClose);

    const cancelled = this.table.cancelAll();
    if (!wasReady) return;

    const consumer = this.consumer;
    const replyQueue = this.replyQueue;
    this.consumer = null;
    this.replyQueue = null;
    try {
      await consumer?.cancel();
      if (replyQueue) {
        await this.transport.deleteQueue(replyQueue);
      }
    } catch (err) {
      this.logger.warn({ error: errorMessage(err) }, 'Failed to remove reply queue');
    }
    this.logger.info({ cancelled }, 'RPC client closed');
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async dispatch(payload: unknown, options: CallOptions): Promise<CallOutcome> {
    if (this._state === 'idle') {
      throw new Error('RPC client is not started');
    }

    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new InvalidCallError(`timeoutMs must be a positive number, got ${timeoutMs}`);
    }
    if (options.correlationId !== undefined && this.table.has(options.correlationId)) {
      throw new InvalidCallError(`Correlation id is already outstanding: ${options.correlationId}`);
    }

    const correlationId = options.correlationId ?? this.freshCorrelationId();
    const replyQueue = this.replyQueue;
    if (this._state === 'closed' || replyQueue === null) {
      return { status: 'unavailable', correlationId, message: 'RPC client is closed' };
    }
    if (options.signal?.aborted) {
      return { status: 'cancelled', correlationId };
    }

    const outcome = this.table.register(correlationId, timeoutMs);
    const call = this.table.get(correlationId);
    const deadline = call ? call.deadline : Date.now() + timeoutMs;
    const log = this.logger.child({ correlationId });

    const signal = options.signal;
    const onAbort = (): void => {
      this.cancel(correlationId);
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    const submittedAt = call?.submittedAt ?? Date.now();
    const { body, properties } = encodeCall(correlationId, replyQueue, payload, submittedAt);
    log.debug({ timeoutMs }, 'Sending call');
    await this.publishRequest(correlationId, body, properties, deadline, log);

    const result = await outcome;
    signal?.removeEventListener('abort', onAbort);
    log.debug({ status: result.status }, 'Call settled');
    return result;
  }

  private freshCorrelationId(): string {
    let correlationId = generateCorrelationId();
    while (this.table.has(correlationId)) {
      correlationId = generateCorrelationId();
    }
    return correlationId;
  }

  private async publishRequest(
    correlationId: string,
    body: Buffer,
    properties: MessageProperties,
    deadline: number,
    log: Logger,
  ): Promise<void> {
    try {
      await retry(() => this.transport.publish(this.queueName, body, properties), {
        policy: this.publishPolicy,
        deadline,
        sleep: this.sleep,
        shouldRetry: () => this.table.has(correlationId),
        onRetry: (err, attempt, delayMs) => {
          log.warn(
            { attempt, delayMs, error: errorMessage(err) },
            'Request publish failed, retrying',
          );
        },
      });
      this.monitor?.recordSuccess();
    } catch (err) {
      if (!this.table.has(correlationId)) {
        // Settled while publishing (cancelled or timed out)
        return;
      }
      const cause = err instanceof RetryExhaustedError ? err.lastError : err;
      this.monitor?.recordFailure(cause, { queue: this.queueName });

      if (err instanceof RetryExhaustedError && err.exhausted === 'deadline') {
        log.error(
          { attempts: err.attempts, error: errorMessage(cause) },
          'Request not published before deadline',
        );
        return;
      }
      log.error({ error: errorMessage(cause) }, 'Request could not be published');
      this.table.fail(correlationId, `Request could not be published: ${errorMessage(cause)}`);
    }
  }

  private handleReply(delivery: Delivery): void {
    let settled = false;
    try {
      settled = this.table.settleReply(decodeResult(delivery.body));
    } catch (err) {
      this.logger.warn(
        { correlationId: delivery.properties.correlationId, error: errorMessage(err) },
        'Discarding malformed reply',
      );
      this.discarded++;
      return;
    }

    if (!settled) {
      this.discarded++;
      this.logger.debug(
        { correlationId: delivery.properties.correlationId },
        'Discarding reply with no waiting call',
      );
    }
  }
}

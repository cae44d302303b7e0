/**
 * RPC Server
 *
 * Owns the durable request queue. For each delivery:
 * 1. Decode the call; malformed calls are acked, logged and dropped
 * 2. Run the handler (or reuse the reply of an earlier copy of the call)
 * 3. Publish the reply to the caller's queue, retrying on broker errors
 * 4. Ack the delivery, strictly after the reply publish is confirmed
 *
 * Deliveries are processed concurrently, bounded by the consumer prefetch.
 * A reply that cannot be published is nacked with requeue, so the call is
 * redelivered and its prefetch slot freed. The redelivered copy is answered
 * from the replay cache without running the handler again.
 *
 * Lifecycle: idle -> serving -> stopping -> stopped
 *
 * @module rpc-server
 */

import { EventEmitter } from 'node:events';
import type { Logger } from 'pino';
import type { ConsumerHandle, Delivery, Transport } from './transport/types.js';
import type { CallEnvelope, HandlerReply, ResultEnvelope, RpcHandler } from './types.js';
import { decodeCall, encodeResult } from './envelope.js';
import { CallFailedError, errorMessage } from './errors.js';
import { ExponentialBackoff, RetryExhaustedError, retry } from './retry-policy.js';
import type { RetryPolicy, SleepFn } from './retry-policy.js';
import { ReplayCache } from './replay-cache.js';
import type { OutageMonitor } from './outage-monitor.js';
import {
  DEFAULT_PREFETCH,
  DEFAULT_REPLAY_TTL_MS,
  DEFAULT_REQUEST_QUEUE,
  REASON_WORKER_ERROR,
} from './constants.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Server lifecycle states */
export type ServerState = 'idle' | 'serving' | 'stopping' | 'stopped';

/** Options for RpcServer */
export interface RpcServerOptions {
  /** Request queue to own (default: rpc_queue) */
  queueName?: string;

  /** Max calls processed concurrently (default: 8) */
  prefetch?: number;

  /** Retry policy for reply publishes (default: 5 attempts, 200ms base) */
  publishPolicy?: RetryPolicy;

  /** How long completed replies are kept for redelivered calls (default: 10 min) */
  replayTtlMs?: number;

  /** Told about reply publish failures and successes */
  monitor?: OutageMonitor;

  logger: Logger;
  sleep?: SleepFn;
}

/** Counters exposed for health reporting */
export interface RpcServerStats {
  received: number;
  succeeded: number;
  failed: number;
  dropped: number;
  replayed: number;
  abandoned: number;
  inFlight: number;
}

/** Events emitted by the server */
export interface RpcServerEvents {
  /** A reply was published and the call acknowledged */
  reply: (result: ResultEnvelope) => void;

  /** A malformed delivery was dropped */
  dropped: (error: Error) => void;

  /** A reply could not be published; the delivery was requeued */
  abandoned: (correlationId: string, error: Error) => void;
}

export interface TypedRpcServerEmitter {
  on<K extends keyof RpcServerEvents>(event: K, listener: RpcServerEvents[K]): this;
  off<K extends keyof RpcServerEvents>(event: K, listener: RpcServerEvents[K]): this;
  emit<K extends keyof RpcServerEvents>(event: K, ...args: Parameters<RpcServerEvents[K]>): boolean;
}

// ---------------------------------------------------------------------------
// RpcServer
// ---------------------------------------------------------------------------

export class RpcServer extends EventEmitter implements TypedRpcServerEmitter {
  readonly queueName: string;
  private readonly transport: Transport;
  private readonly handler: RpcHandler;
  private readonly prefetch: number;
  private readonly publishPolicy: RetryPolicy;
  private readonly replays: ReplayCache;
  private readonly monitor?: OutageMonitor;
  private readonly logger: Logger;
  private readonly sleep?: SleepFn;

  private _state: ServerState = 'idle';
  private consumer: ConsumerHandle | null = null;
  private readonly inflight: Set<Promise<void>> = new Set();
  private readonly counters = {
    received: 0,
    succeeded: 0,
    failed: 0,
    dropped: 0,
    replayed: 0,
    abandoned: 0,
  };

  constructor(transport: Transport, handler: RpcHandler, options: RpcServerOptions) {
    super();
    this.transport = transport;
    this.handler = handler;
    this.queueName = options.queueName ?? DEFAULT_REQUEST_QUEUE;
    this.prefetch = options.prefetch ?? DEFAULT_PREFETCH;
    this.publishPolicy =
      options.publishPolicy ?? new ExponentialBackoff({ maxAttempts: 5, baseDelayMs: 200 });
    this.replays = new ReplayCache(options.replayTtlMs ?? DEFAULT_REPLAY_TTL_MS);
    this.monitor = options.monitor;
    this.logger = options.logger.child({ component: 'rpc-server', queue: this.queueName });
    this.sleep = options.sleep;
  }

  get state(): ServerState {
    return this._state;
  }

  get stats(): RpcServerStats {
    return { ...this.counters, inFlight: this.inflight.size };
  }

  /**
   * Declare the request queue and start consuming. Resolves once deliveries
   * are flowing; processing continues until `stop()`.
   */
  async serve(): Promise<void> {
    if (this._state !== 'idle' && this._state !== 'stopped') {
      throw new Error(`Cannot serve from state: ${this._state}`);
    }

    await this.transport.assertQueue(this.queueName, { durable: true });
    this.consumer = await this.transport.consume(
      this.queueName,
      (delivery) => {
        this.accept(delivery);
      },
      { prefetch: this.prefetch },
    );
    this._state = 'serving';
    this.logger.info({ prefetch: this.prefetch }, 'RPC server started');
  }

  /**
   * Stop consuming and wait for in-flight calls to finish.
   */
  async stop(): Promise<void> {
    if (this._state !== 'serving') return;
    this._state = 'stopping';

    const consumer = this.consumer;
    this.consumer = null;
    if (consumer) {
      await consumer.cancel();
    }
    await Promise.all(Array.from(this.inflight));

    this._state = 'stopped';
    this.logger.info(this.stats, 'RPC server stopped');
  }

  // -------------------------------------------------------------------------
  // Per-delivery processing
  // -------------------------------------------------------------------------

  private accept(delivery: Delivery): void {
    this.counters.received++;
    const task: Promise<void> = this.process(delivery)
      .catch((err: unknown) => {
        this.logger.error({ error: errorMessage(err) }, 'Unexpected error while processing call');
      })
      .then(() => {
        this.inflight.delete(task);
      });
    this.inflight.add(task);
  }

  private async process(delivery: Delivery): Promise<void> {
    let call: CallEnvelope;
    try {
      call = decodeCall(delivery);
    } catch (err) {
      this.counters.dropped++;
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.warn(
        { error: error.message, messageId: delivery.properties.messageId },
        'Dropping malformed call',
      );
      await delivery.ack();
      this.emit('dropped', error);
      return;
    }

    const log = this.logger.child({ correlationId: call.correlationId });
    let result: ResultEnvelope;

    const earlier = this.replays.get(call.correlationId);
    if (earlier) {
      this.counters.replayed++;
      log.info({ redelivered: delivery.redelivered }, 'Duplicate call, reusing earlier reply');
      result = await earlier;
    } else {
      const pending = this.execute(call, delivery.redelivered, log);
      this.replays.begin(call.correlationId, pending);
      result = await pending;
      this.replays.complete(call.correlationId);
      if (result.status === 'ok') {
        this.counters.succeeded++;
      } else {
        this.counters.failed++;
      }
    }

    try {
      await this.publishReply(call, result, log);
    } catch (err) {
      this.counters.abandoned++;
      const error = err instanceof Error ? err : new Error(String(err));
      log.error(
        { replyTo: call.replyTo, error: error.message },
        'Reply could not be published, requeueing call',
      );
      this.monitor?.recordFailure(error, { correlationId: call.correlationId });
      await this.requeue(delivery, log);
      this.emit('abandoned', call.correlationId, error);
      return;
    }

    this.monitor?.recordSuccess();
    await delivery.ack();
    this.emit('reply', result);
  }

  private async requeue(delivery: Delivery, log: Logger): Promise<void> {
    try {
      await delivery.nack(true);
    } catch (err) {
      // Channel already gone: the broker requeues on close
      log.warn({ error: errorMessage(err) }, 'Could not requeue call');
    }
  }

  private async execute(
    call: CallEnvelope,
    redelivered: boolean,
    log: Logger,
  ): Promise<ResultEnvelope> {
    const startedAt = Date.now();
    let reply: HandlerReply;

    try {
      reply = await this.handler(call.payload, {
        correlationId: call.correlationId,
        submittedAt: call.submittedAt,
        redelivered,
      });
    } catch (err) {
      const reason = err instanceof CallFailedError ? err.reason : REASON_WORKER_ERROR;
      log.error({ reason, error: errorMessage(err) }, 'Handler failed');
      reply = { status: 'failed', reason, message: errorMessage(err) };
    }

    log.debug({ status: reply.status, durationMs: Date.now() - startedAt }, 'Call processed');

    if (reply.status === 'ok') {
      return { correlationId: call.correlationId, status: 'ok', payload: reply.payload };
    }
    return {
      correlationId: call.correlationId,
      status: 'failed',
      reason: reply.reason,
      message: reply.message,
    };
  }

  private async publishReply(
    call: CallEnvelope,
    result: ResultEnvelope,
    log: Logger,
  ): Promise<void> {
    const { body, properties } = encodeResult(result);
    try {
      await retry(() => this.transport.publish(call.replyTo, body, properties), {
        policy: this.publishPolicy,
        sleep: this.sleep,
        onRetry: (err, attempt, delayMs) => {
          log.warn(
            { attempt, delayMs, error: errorMessage(err) },
            'Reply publish failed, retrying',
          );
        },
      });
    } catch (err) {
      throw err instanceof RetryExhaustedError && err.lastError instanceof Error
        ? err.lastError
        : err;
    }
    log.debug({ replyTo: call.replyTo, status: result.status }, 'Reply sent');
  }
}

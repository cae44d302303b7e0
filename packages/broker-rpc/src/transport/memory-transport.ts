/**
 * In-process broker.
 *
 * Implements the subset of AMQP queue semantics the RPC engine relies on:
 * named queues, exclusive reply queues that vanish with their connection,
 * per-consumer prefetch, ack/nack, and requeue of unacknowledged messages
 * (flagged `redelivered`) when a connection closes. Deliveries are
 * dispatched on the microtask queue, never inside `publish()`.
 *
 * Fault injection (`setAvailable`, `failPublishes`) lets tests simulate
 * an unreachable broker.
 *
 * @module transport/memory-transport
 */

import { EventEmitter } from 'node:events';
import { randomBytes } from 'node:crypto';
import { TransportError } from '../errors.js';
import type {
  ConsumeOptions,
  ConsumerHandle,
  Delivery,
  DeliveryHandler,
  MessageProperties,
  QueueOptions,
  Transport,
} from './types.js';

// ---------------------------------------------------------------------------
// Broker state
// ---------------------------------------------------------------------------

interface StoredMessage {
  body: Buffer;
  properties: MessageProperties;
  redelivered: boolean;
}

interface ConsumerState {
  tag: string;
  queue: string;
  owner: MemoryTransport;
  handler: DeliveryHandler;
  prefetch: number;
  noAck: boolean;
  active: boolean;
  unacked: Map<number, StoredMessage>;
}

interface QueueState {
  name: string;
  durable: boolean;
  exclusiveOwner: MemoryTransport | null;
  messages: StoredMessage[];
  cursor: number;
}

/**
 * A broker shared by any number of MemoryTransport connections.
 *
 * @example
 * ```ts
 * const broker = new MemoryBroker();
 * const serverSide = await broker.connect();
 * const clientSide = await broker.connect();
 * ```
 */
export class MemoryBroker {
  private readonly queues: Map<string, QueueState> = new Map();
  private readonly consumers: Map<string, ConsumerState> = new Map();
  private available = true;
  private pendingPublishFailures = 0;
  private nextDeliveryTag = 1;
  private nextConsumerTag = 1;
  private _published = 0;

  /** Open a connection. Rejects while the broker is unavailable. */
  async connect(): Promise<MemoryTransport> {
    if (!this.available) {
      throw new TransportError('Broker unavailable: connection refused');
    }
    return new MemoryTransport(this);
  }

  /** Toggle availability. While unavailable, connects and publishes fail. */
  setAvailable(available: boolean): void {
    this.available = available;
  }

  /** Make the next `count` publishes fail with a TransportError. */
  failPublishes(count: number): void {
    this.pendingPublishFailures = count;
  }

  /** Messages waiting for a consumer */
  queueDepth(name: string): number {
    return this.queues.get(name)?.messages.length ?? 0;
  }

  /** Messages delivered on a queue but not yet acknowledged */
  unackedCount(name: string): number {
    let count = 0;
    for (const consumer of this.consumers.values()) {
      if (consumer.queue === name) count += consumer.unacked.size;
    }
    return count;
  }

  /** Active consumers on a queue */
  consumerCount(name: string): number {
    return this.activeConsumers(name).length;
  }

  hasQueue(name: string): boolean {
    return this.queues.has(name);
  }

  /** Total messages accepted by `publish()` */
  get published(): number {
    return this._published;
  }

  // -------------------------------------------------------------------------
  // Operations used by MemoryTransport
  // -------------------------------------------------------------------------

  /** @internal */
  assertQueue(name: string, durable: boolean, exclusiveOwner: MemoryTransport | null): void {
    this.ensureAvailable();
    if (!this.queues.has(name)) {
      this.queues.set(name, { name, durable, exclusiveOwner, messages: [], cursor: 0 });
    }
  }

  /** @internal */
  deleteQueue(name: string): void {
    this.queues.delete(name);
    for (const consumer of this.consumers.values()) {
      if (consumer.queue === name) {
        consumer.active = false;
        consumer.unacked.clear();
        this.consumers.delete(consumer.tag);
      }
    }
  }

  /** @internal */
  publish(queue: string, body: Buffer, properties: MessageProperties): void {
    this.ensureAvailable();
    if (this.pendingPublishFailures > 0) {
      this.pendingPublishFailures--;
      throw new TransportError(`Publish to ${queue} was not confirmed by the broker`);
    }

    const state = this.queues.get(queue);
    this._published++;
    if (!state) return;

    state.messages.push({
      body: Buffer.from(body),
      properties: { ...properties },
      redelivered: false,
    });
    this.scheduleDrain(queue);
  }

  /** @internal */
  consume(
    owner: MemoryTransport,
    queue: string,
    handler: DeliveryHandler,
    options: ConsumeOptions,
  ): string {
    this.ensureAvailable();
    const state = this.queues.get(queue);
    if (!state) {
      throw new TransportError(`Cannot consume from missing queue: ${queue}`);
    }
    if (state.exclusiveOwner && state.exclusiveOwner !== owner) {
      throw new TransportError(`Queue ${queue} is exclusive to another connection`);
    }

    const tag = `ctag-${this.nextConsumerTag++}`;
    this.consumers.set(tag, {
      tag,
      queue,
      owner,
      handler,
      prefetch: options.prefetch ?? 0,
      noAck: options.noAck ?? false,
      active: true,
      unacked: new Map(),
    });
    this.scheduleDrain(queue);
    return tag;
  }

  /** @internal Stop deliveries to a consumer; its unacked messages stay outstanding. */
  cancel(tag: string): void {
    const consumer = this.consumers.get(tag);
    if (!consumer) return;
    consumer.active = false;
    if (consumer.unacked.size === 0) {
      this.consumers.delete(tag);
    }
  }

  /** @internal Drop a connection: requeue its unacked messages, delete its exclusive queues. */
  disconnect(owner: MemoryTransport): void {
    const touched = new Set<string>();

    for (const consumer of Array.from(this.consumers.values())) {
      if (consumer.owner !== owner) continue;
      const state = this.queues.get(consumer.queue);
      if (state && consumer.unacked.size > 0) {
        const returned = Array.from(consumer.unacked.values()).map((m) => ({
          ...m,
          redelivered: true,
        }));
        state.messages.unshift(...returned);
        touched.add(consumer.queue);
      }
      consumer.active = false;
      consumer.unacked.clear();
      this.consumers.delete(consumer.tag);
    }

    for (const state of Array.from(this.queues.values())) {
      if (state.exclusiveOwner === owner) {
        this.queues.delete(state.name);
        touched.delete(state.name);
      }
    }

    for (const queue of touched) {
      this.scheduleDrain(queue);
    }
  }

  // -------------------------------------------------------------------------
  // Dispatch
  // -------------------------------------------------------------------------

  private ensureAvailable(): void {
    if (!this.available) {
      throw new TransportError('Broker unavailable');
    }
  }

  private activeConsumers(queue: string): ConsumerState[] {
    return Array.from(this.consumers.values()).filter((c) => c.queue === queue && c.active);
  }

  private scheduleDrain(queue: string): void {
    queueMicrotask(() => {
      this.drain(queue);
    });
  }

  private drain(queue: string): void {
    const state = this.queues.get(queue);
    if (!state) return;

    while (state.messages.length > 0) {
      const consumer = this.nextConsumer(state);
      if (!consumer) return;

      const message = state.messages.shift();
      if (!message) return;
      this.deliver(consumer, message);
    }
  }

  /** Round-robin over active consumers that have prefetch capacity */
  private nextConsumer(state: QueueState): ConsumerState | undefined {
    const candidates = this.activeConsumers(state.name);
    for (let i = 0; i < candidates.length; i++) {
      const index = (state.cursor + i) % candidates.length;
      const candidate = candidates[index];
      if (!candidate) continue;
      const hasRoom = candidate.prefetch === 0 || candidate.unacked.size < candidate.prefetch;
      if (candidate.noAck || hasRoom) {
        state.cursor = index + 1;
        return candidate;
      }
    }
    return undefined;
  }

  private deliver(consumer: ConsumerState, message: StoredMessage): void {
    const deliveryTag = this.nextDeliveryTag++;
    if (!consumer.noAck) {
      consumer.unacked.set(deliveryTag, message);
    }

    const settle = (requeue: boolean | null): void => {
      if (consumer.noAck) return;
      if (!consumer.unacked.delete(deliveryTag)) {
        throw new TransportError(
          `Unknown delivery tag ${deliveryTag}: channel closed or already settled`,
        );
      }
      const state = this.queues.get(consumer.queue);
      if (requeue && state) {
        state.messages.unshift({ ...message, redelivered: true });
      }
      if (!consumer.active && consumer.unacked.size === 0) {
        this.consumers.delete(consumer.tag);
      }
      this.scheduleDrain(consumer.queue);
    };

    const delivery: Delivery = {
      body: message.body,
      properties: { ...message.properties },
      redelivered: message.redelivered,
      ack: async () => {
        settle(null);
      },
      nack: async (requeue: boolean) => {
        settle(requeue);
      },
    };

    consumer.handler(delivery);
  }
}

// ---------------------------------------------------------------------------
// MemoryTransport
// ---------------------------------------------------------------------------

/** One connection to a MemoryBroker */
export class MemoryTransport extends EventEmitter implements Transport {
  private readonly broker: MemoryBroker;
  private closed = false;

  constructor(broker: MemoryBroker) {
    super();
    this.broker = broker;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async assertQueue(name: string, options?: QueueOptions): Promise<void> {
    this.ensureOpen();
    this.broker.assertQueue(name, options?.durable ?? true, null);
  }

  async createReplyQueue(): Promise<string> {
    this.ensureOpen();
    const name = `amq.gen-${randomBytes(8).toString('hex')}`;
    this.broker.assertQueue(name, false, this);
    return name;
  }

  async deleteQueue(name: string): Promise<void> {
    this.ensureOpen();
    this.broker.deleteQueue(name);
  }

  async publish(queue: string, body: Buffer, properties: MessageProperties = {}): Promise<void> {
    this.ensureOpen();
    this.broker.publish(queue, body, properties);
  }

  async consume(
    queue: string,
    handler: DeliveryHandler,
    options: ConsumeOptions = {},
  ): Promise<ConsumerHandle> {
    this.ensureOpen();
    const tag = this.broker.consume(this, queue, handler, options);
    return {
      tag,
      cancel: async () => {
        this.broker.cancel(tag);
      },
    };
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.broker.disconnect(this);
    this.emit('close');
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new TransportError('Transport is closed');
    }
  }
}

/**
 * Transport Channel Interface
 *
 * The substrate the RPC engine runs over: one durable, named request queue
 * plus reply queues addressed by name. Implementations hide the broker
 * specifics (AMQP, in-process) so the client and server stay broker-agnostic.
 *
 * Implementations:
 * - MemoryTransport: in-process broker, used for tests and single-process runs
 * - AmqpTransport: RabbitMQ over amqplib, with publisher confirms
 *
 * @module transport/types
 */

// ---------------------------------------------------------------------------
// Message shapes
// ---------------------------------------------------------------------------

/** Broker-level properties carried alongside a message body */
export interface MessageProperties {
  /** Token binding a reply to its request */
  correlationId?: string;

  /** Queue the reply should be published to */
  replyTo?: string;

  /** Broker message identifier */
  messageId?: string;

  /** Epoch milliseconds when the message was produced */
  timestamp?: number;

  /** MIME type of the body */
  contentType?: string;

  /** Whether the broker should persist the message to disk */
  persistent?: boolean;
}

/** A message handed to a consumer */
export interface Delivery {
  /** Raw message body */
  body: Buffer;

  /** Properties set by the producer */
  properties: MessageProperties;

  /** True when the broker has delivered this message before */
  redelivered: boolean;

  /** Acknowledge consumption; the broker forgets the message. */
  ack(): Promise<void>;

  /**
   * Reject the message.
   *
   * @param requeue - Put the message back on the queue for redelivery.
   */
  nack(requeue: boolean): Promise<void>;
}

/** Callback invoked for each delivery. Must not throw synchronously. */
export type DeliveryHandler = (delivery: Delivery) => void;

/** Options for declaring a queue */
export interface QueueOptions {
  /** Survive broker restarts (default: true) */
  durable?: boolean;
}

/** Options for starting a consumer */
export interface ConsumeOptions {
  /** Max unacknowledged deliveries in flight for this consumer. 0 = unlimited. */
  prefetch?: number;

  /** Deliveries are considered acknowledged as soon as they are sent */
  noAck?: boolean;
}

/** Handle returned by `consume()` */
export interface ConsumerHandle {
  /** Broker-assigned consumer tag */
  readonly tag: string;

  /** Stop receiving deliveries. Unacked deliveries stay with the broker. */
  cancel(): Promise<void>;
}

/** Events emitted by a transport */
export interface TransportEvents {
  /** A connection or channel level error */
  error: (err: Error) => void;

  /** The transport closed, either on request or because the connection dropped */
  close: () => void;
}

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

/**
 * Broker connection used by the RPC engine.
 *
 * `publish()` rejects with a `TransportError` when the broker cannot accept
 * the message. Publishing to a queue that does not exist is not an error:
 * the message is dropped, as with AMQP's default exchange.
 */
export interface Transport {
  /** Declare a named queue (idempotent). */
  assertQueue(name: string, options?: QueueOptions): Promise<void>;

  /** Create an exclusive, auto-deleted queue owned by this connection. */
  createReplyQueue(): Promise<string>;

  /** Delete a queue and any messages in it. */
  deleteQueue(name: string): Promise<void>;

  /** Publish a message to a queue. */
  publish(queue: string, body: Buffer, properties?: MessageProperties): Promise<void>;

  /** Start consuming a queue. */
  consume(
    queue: string,
    handler: DeliveryHandler,
    options?: ConsumeOptions,
  ): Promise<ConsumerHandle>;

  /** Close the connection. Unacked deliveries return to their queues. */
  close(): Promise<void>;

  on<K extends keyof TransportEvents>(event: K, listener: TransportEvents[K]): this;
  off<K extends keyof TransportEvents>(event: K, listener: TransportEvents[K]): this;
}

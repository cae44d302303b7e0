export { MemoryBroker, MemoryTransport } from './memory-transport.js';
export { AmqpTransport } from './amqp-transport.js';
export { connectWithRetry } from './connect.js';
export type { AmqpTransportOptions } from './amqp-transport.js';
export type { ConnectWithRetryOptions } from './connect.js';
export type {
  Transport,
  TransportEvents,
  Delivery,
  DeliveryHandler,
  MessageProperties,
  QueueOptions,
  ConsumeOptions,
  ConsumerHandle,
} from './types.js';

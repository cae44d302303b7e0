/**
 * @speed-rpc/broker-rpc
 *
 * Request/reply calls over a message broker: a client that awaits replies
 * by correlation id, a server that owns the request queue, and the
 * transports, retry policies and outage alerts they share.
 *
 * @module broker-rpc
 */

// Transports
export {
  MemoryBroker,
  MemoryTransport,
  AmqpTransport,
  connectWithRetry,
} from './transport/index.js';
export type {
  AmqpTransportOptions,
  ConnectWithRetryOptions,
  Transport,
  TransportEvents,
  Delivery,
  DeliveryHandler,
  MessageProperties,
  QueueOptions,
  ConsumeOptions,
  ConsumerHandle,
} from './transport/index.js';

// Client and server
export { RpcClient } from './rpc-client.js';
export type {
  RpcClientOptions,
  CallOptions,
  DecodedCallOptions,
  ClientState,
} from './rpc-client.js';
export { RpcServer } from './rpc-server.js';
export type {
  RpcServerOptions,
  RpcServerStats,
  RpcServerEvents,
  ServerState,
} from './rpc-server.js';

// Envelopes
export { encodeCall, decodeCall, encodeResult, decodeResult } from './envelope.js';
export type {
  CallEnvelope,
  OkResult,
  FailedResult,
  ResultEnvelope,
  HandlerReply,
  CallSucceeded,
  CallFailed,
  CallTimedOut,
  CallCancelled,
  CallUnavailable,
  CallOutcome,
  LocalOutcomeStatus,
  CallContext,
  RpcHandler,
} from './types.js';

// Bookkeeping
export { PendingCallTable } from './pending-calls.js';
export type { PendingCall } from './pending-calls.js';
export { ReplayCache } from './replay-cache.js';
export { generateCorrelationId } from './ids.js';

// Retry
export { ExponentialBackoff, RetryExhaustedError, retry, sleep } from './retry-policy.js';
export type {
  RetryPolicy,
  RetryOptions,
  ExponentialBackoffOptions,
  JitterMode,
  SleepFn,
} from './retry-policy.js';

// Alerts
export { OutageMonitor } from './outage-monitor.js';
export type {
  AdminAlert,
  AdminNotifier,
  AlertSeverity,
  OutageMonitorOptions,
} from './outage-monitor.js';

// Errors and constants
export {
  TransportError,
  ProtocolError,
  CallFailedError,
  InvalidCallError,
  errorMessage,
} from './errors.js';
export {
  DEFAULT_REQUEST_QUEUE,
  DEFAULT_CALL_TIMEOUT_MS,
  DEFAULT_PREFETCH,
  DEFAULT_REPLAY_TTL_MS,
  ENVELOPE_CONTENT_TYPE,
  REASON_WORKER_ERROR,
  REASON_INVALID_REQUEST,
  REASON_INVALID_REPLY,
} from './constants.js';

/**
 * RPC envelope and outcome types.
 *
 * The call travels as broker properties (correlation id, reply queue,
 * timestamp) plus a JSON payload body; the reply is a JSON body carrying
 * the echoed correlation id and either a payload or a failure.
 *
 * @module types
 */

// ---------------------------------------------------------------------------
// Envelopes
// ---------------------------------------------------------------------------

/** A request as seen by the server after decoding */
export interface CallEnvelope<P = unknown> {
  /** Unique per outstanding call at the client */
  correlationId: string;

  /** Queue the reply goes to; valid until the call resolves or times out */
  replyTo: string;

  /** Opaque request body */
  payload: P;

  /** Epoch milliseconds when the client published the call */
  submittedAt: number;
}

/** Successful reply */
export interface OkResult<R = unknown> {
  correlationId: string;
  status: 'ok';
  payload: R;
}

/** Failed reply */
export interface FailedResult {
  correlationId: string;
  status: 'failed';

  /** Machine-readable reason, e.g. `worker_error` or `storage_exhausted` */
  reason: string;

  /** Human-readable description */
  message: string;
}

/** Exactly one of these is published per accepted call */
export type ResultEnvelope<R = unknown> = OkResult<R> | FailedResult;

/** What a handler returns; the server adds the correlation id. */
export type HandlerReply<R = unknown> =
  | { status: 'ok'; payload: R }
  | { status: 'failed'; reason: string; message: string };

// ---------------------------------------------------------------------------
// Client outcomes
// ---------------------------------------------------------------------------

/** Server replied with a result */
export interface CallSucceeded<R> {
  status: 'ok';
  correlationId: string;
  payload: R;
}

/** Server replied with a failure */
export interface CallFailed {
  status: 'failed';
  correlationId: string;
  reason: string;
  message: string;
}

/** No reply arrived before the deadline */
export interface CallTimedOut {
  status: 'timeout';
  correlationId: string;
  timeoutMs: number;
}

/** The owner cancelled the call, or the client closed */
export interface CallCancelled {
  status: 'cancelled';
  correlationId: string;
}

/** The request could not be published: infrastructure unavailable */
export interface CallUnavailable {
  status: 'unavailable';
  correlationId: string;
  message: string;
}

/**
 * Caller-facing result of `RpcClient.call()`.
 *
 * `failed` means the server processed the call and reported a failure;
 * `timeout` and `unavailable` mean the system could not process it.
 */
export type CallOutcome<R = unknown> =
  | CallSucceeded<R>
  | CallFailed
  | CallTimedOut
  | CallCancelled
  | CallUnavailable;

/** Outcome statuses that did not involve a reply from the server */
export type LocalOutcomeStatus = Exclude<CallOutcome['status'], 'ok' | 'failed'>;

// ---------------------------------------------------------------------------
// Handler contract
// ---------------------------------------------------------------------------

/** Per-call information passed to the handler */
export interface CallContext {
  correlationId: string;
  submittedAt: number;

  /** The broker has delivered this call before */
  redelivered: boolean;
}

/**
 * Server-side operation. May be slow and may throw; the server converts
 * exceptions into `failed` replies.
 */
export type RpcHandler<P = unknown, R = unknown> = (
  payload: P,
  context: CallContext,
) => Promise<HandlerReply<R>>;

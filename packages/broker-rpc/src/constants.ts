/**
 * RPC engine constants.
 *
 * @module constants
 */

/** Request queue name used when none is configured */
export const DEFAULT_REQUEST_QUEUE = 'rpc_queue';

/** Client call timeout used when the caller gives none: 2 minutes */
export const DEFAULT_CALL_TIMEOUT_MS = 2 * 60 * 1000;

/** Calls processed concurrently by one server */
export const DEFAULT_PREFETCH = 8;

/** How long a completed reply is kept for redelivered calls: 10 minutes */
export const DEFAULT_REPLAY_TTL_MS = 10 * 60 * 1000;

/** Content type of every envelope body */
export const ENVELOPE_CONTENT_TYPE = 'application/json';

/** Failure reason for an exception escaping the handler */
export const REASON_WORKER_ERROR = 'worker_error';

/** Failure reason when the request payload does not match the handler's schema */
export const REASON_INVALID_REQUEST = 'invalid_request';

/** Failure reason when a reply payload fails the caller's decoder */
export const REASON_INVALID_REPLY = 'invalid_reply';

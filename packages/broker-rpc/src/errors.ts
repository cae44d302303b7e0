/**
 * Error types shared by the transport, client and server.
 *
 * @module errors
 */

/** The broker could not be reached or refused a publish. */
export class TransportError extends Error {
  override readonly name = 'TransportError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** An incoming message is not a valid call or reply envelope. */
export class ProtocolError extends Error {
  override readonly name = 'ProtocolError';

  constructor(message: string) {
    super(message);
  }
}

/**
 * Thrown by an RPC handler to fail a call with a specific reason.
 *
 * Any other error escaping a handler is reported as `worker_error`.
 */
export class CallFailedError extends Error {
  override readonly name = 'CallFailedError';

  /** Machine-readable failure reason placed in the reply */
  readonly reason: string;

  constructor(reason: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.reason = reason;
  }
}

/**
 * A call was made with arguments no broker state could fix: a non-positive
 * timeout, or a correlation id that is already outstanding on this client.
 */
export class InvalidCallError extends Error {
  override readonly name = 'InvalidCallError';

  constructor(message: string) {
    super(message);
  }
}

/**
 * Extract a printable message from an unknown thrown value.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Envelope encoding and validation.
 *
 * Calls: correlation id, reply queue and submit time ride in broker
 * properties, the payload is the JSON body. Replies: a JSON body that
 * carries the echoed correlation id; the id is also set as a property.
 *
 * @module envelope
 */

import { z } from 'zod';
import { ProtocolError, errorMessage } from './errors.js';
import type { Delivery, MessageProperties } from './transport/types.js';
import type { CallEnvelope, ResultEnvelope } from './types.js';
import { ENVELOPE_CONTENT_TYPE } from './constants.js';

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const nonEmpty = z.string().trim().min(1);

const resultSchema = z.discriminatedUnion('status', [
  z.object({
    correlationId: nonEmpty,
    status: z.literal('ok'),
    payload: z.unknown(),
  }),
  z.object({
    correlationId: nonEmpty,
    status: z.literal('failed'),
    reason: nonEmpty,
    message: z.string(),
  }),
]);

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function parseJson(body: Buffer, what: string): unknown {
  if (body.length === 0) {
    throw new ProtocolError(`${what} body is empty`);
  }
  try {
    const value: unknown = JSON.parse(body.toString('utf-8'));
    return value;
  } catch (err) {
    throw new ProtocolError(`${what} body is not valid JSON: ${errorMessage(err)}`);
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

// ---------------------------------------------------------------------------
// Calls
// ---------------------------------------------------------------------------

/**
 * Build the body and properties for a call.
 */
export function encodeCall(
  correlationId: string,
  replyTo: string,
  payload: unknown,
  submittedAt: number,
): { body: Buffer; properties: MessageProperties } {
  return {
    body: Buffer.from(JSON.stringify(payload ?? null), 'utf-8'),
    properties: {
      correlationId,
      replyTo,
      timestamp: submittedAt,
      contentType: ENVELOPE_CONTENT_TYPE,
      persistent: true,
    },
  };
}

/**
 * Decode a delivery from the request queue.
 *
 * @throws ProtocolError when the correlation id or reply queue is missing
 *   or the body is not JSON.
 */
export function decodeCall(delivery: Pick<Delivery, 'body' | 'properties'>): CallEnvelope {
  const { correlationId, replyTo, timestamp } = delivery.properties;

  if (!correlationId || !correlationId.trim()) {
    throw new ProtocolError('Call is missing a correlation id');
  }
  if (!replyTo || !replyTo.trim()) {
    throw new ProtocolError(`Call ${correlationId} is missing a reply queue`);
  }

  const payload = parseJson(delivery.body, `Call ${correlationId}`);

  return {
    correlationId,
    replyTo,
    payload,
    submittedAt:
      typeof timestamp === 'number' && Number.isFinite(timestamp) ? timestamp : Date.now(),
  };
}

// ---------------------------------------------------------------------------
// Replies
// ---------------------------------------------------------------------------

/**
 * Serialize a reply envelope.
 */
export function encodeResult(result: ResultEnvelope): {
  body: Buffer;
  properties: MessageProperties;
} {
  return {
    body: Buffer.from(JSON.stringify(result), 'utf-8'),
    properties: {
      correlationId: result.correlationId,
      contentType: ENVELOPE_CONTENT_TYPE,
      timestamp: Date.now(),
    },
  };
}

/**
 * Decode a reply delivery.
 *
 * @throws ProtocolError when the body is not a valid result envelope.
 */
export function decodeResult(body: Buffer): ResultEnvelope {
  const raw = parseJson(body, 'Reply');
  const parsed = resultSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ProtocolError(`Invalid reply envelope: ${formatIssues(parsed.error)}`);
  }

  const data = parsed.data;
  if (data.status === 'ok') {
    return { correlationId: data.correlationId, status: 'ok', payload: data.payload };
  }
  return data;
}

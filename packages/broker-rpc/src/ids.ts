/**
 * Correlation ID generation.
 *
 * IDs are random UUIDs; the client draws again if one is already
 * outstanding.
 */

import { randomUUID } from 'node:crypto';

/**
 * Generate a fresh correlation id (e.g., `3b241101-e2bb-4255-8caf-4136c566a962`).
 */
export function generateCorrelationId(): string {
  return randomUUID();
}

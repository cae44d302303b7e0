/**
 * Server-side deduplication of calls by correlation id.
 *
 * With at-least-once delivery the same call can arrive twice: while the
 * first copy is still being processed, or after its reply was published
 * but before the ack reached the broker. The cache hands back the first
 * copy's reply so the handler runs once per correlation id.
 */

import type { ResultEnvelope } from './types.js';

interface ReplayEntry {
  reply: Promise<ResultEnvelope>;
  /** Epoch ms when processing finished; null while in flight */
  completedAt: number | null;
}

/**
 * Completed entries are kept in completion order (re-inserted on
 * {@link ReplayCache.complete}), so pruning stops at the first one still
 * inside the TTL. In-flight entries are never pruned.
 */
export class ReplayCache {
  private readonly entries: Map<string, ReplayEntry> = new Map();
  private readonly ttlMs: number;

  constructor(ttlMs: number) {
    this.ttlMs = ttlMs;
  }

  /** Reply for a call seen before, if still retained */
  get(correlationId: string): Promise<ResultEnvelope> | undefined {
    this.prune();
    return this.entries.get(correlationId)?.reply;
  }

  /** Record that processing of a call has started */
  begin(correlationId: string, reply: Promise<ResultEnvelope>): void {
    this.entries.delete(correlationId);
    this.entries.set(correlationId, { reply, completedAt: null });
  }

  /** Record that processing finished; starts the retention window */
  complete(correlationId: string, now: number = Date.now()): void {
    const entry = this.entries.get(correlationId);
    if (entry) {
      this.entries.delete(correlationId);
      this.entries.set(correlationId, { reply: entry.reply, completedAt: now });
    }
  }

  /** Drop completed entries older than the TTL */
  prune(now: number = Date.now()): void {
    for (const [correlationId, entry] of this.entries) {
      if (entry.completedAt === null) continue;
      if (now - entry.completedAt <= this.ttlMs) return;
      this.entries.delete(correlationId);
    }
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Pending Call Table
 *
 * Client-side routing table mapping correlation id -> outstanding call.
 * Owned by a single RpcClient and only touched from the event loop, so the
 * send path (register), receive path (settleReply) and timers never
 * interleave mid-update.
 *
 * Every call settles exactly once: by a reply, by its deadline, by
 * cancellation, or by a publish failure. Whatever comes later finds no
 * entry and is dropped.
 *
 * @module pending-calls
 */

import type { CallOutcome, ResultEnvelope } from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Read-only view of an outstanding call */
export interface PendingCall {
  /** Correlation id binding the call to its reply */
  correlationId: string;

  /** Epoch ms when the call was registered */
  submittedAt: number;

  /** Epoch ms after which the call times out */
  deadline: number;

  /** Timeout the caller asked for */
  timeoutMs: number;
}

interface PendingEntry extends PendingCall {
  settle: (outcome: CallOutcome) => void;
  timer: ReturnType<typeof setTimeout>;
}

// ---------------------------------------------------------------------------
// PendingCallTable
// ---------------------------------------------------------------------------

/**
 * @example
 * ```ts
 * const table = new PendingCallTable();
 * const outcome = table.register('c-1', 5000);
 * table.settleReply({ correlationId: 'c-1', status: 'ok', payload: 42 });
 * await outcome; // { status: 'ok', correlationId: 'c-1', payload: 42 }
 * ```
 */
export class PendingCallTable {
  private readonly pending: Map<string, PendingEntry> = new Map();

  /**
   * Register a call and start its deadline timer.
   *
   * @returns A promise that settles with the call's outcome. It never rejects.
   * @throws Error if the correlation id is already outstanding.
   */
  register(correlationId: string, timeoutMs: number): Promise<CallOutcome> {
    if (this.pending.has(correlationId)) {
      throw new Error(`Correlation id is already outstanding: ${correlationId}`);
    }
    if (!(timeoutMs > 0)) {
      throw new RangeError(`timeoutMs must be positive, got ${timeoutMs}`);
    }

    return new Promise<CallOutcome>((resolve) => {
      const submittedAt = Date.now();
      this.pending.set(correlationId, {
        correlationId,
        submittedAt,
        deadline: submittedAt + timeoutMs,
        timeoutMs,
        settle: resolve,
        timer: setTimeout(() => {
          this.expire(correlationId);
        }, timeoutMs),
      });
    });
  }

  /**
   * Route a reply to its call.
   *
   * @returns false when no call is waiting (unknown, expired or cancelled).
   */
  settleReply(result: ResultEnvelope): boolean {
    if (result.status === 'ok') {
      return this.settle(result.correlationId, {
        status: 'ok',
        correlationId: result.correlationId,
        payload: result.payload,
      });
    }
    return this.settle(result.correlationId, {
      status: 'failed',
      correlationId: result.correlationId,
      reason: result.reason,
      message: result.message,
    });
  }

  /**
   * Settle a call as timed out. Normally invoked by the call's own timer.
   */
  expire(correlationId: string): boolean {
    const entry = this.pending.get(correlationId);
    if (!entry) return false;
    return this.settle(correlationId, {
      status: 'timeout',
      correlationId,
      timeoutMs: entry.timeoutMs,
    });
  }

  /**
   * Cancel a call on behalf of its owner.
   */
  cancel(correlationId: string): boolean {
    return this.settle(correlationId, { status: 'cancelled', correlationId });
  }

  /**
   * Settle a call as unavailable (its request could not be published).
   */
  fail(correlationId: string, message: string): boolean {
    return this.settle(correlationId, { status: 'unavailable', correlationId, message });
  }

  /**
   * Cancel every outstanding call.
   *
   * @returns Number of calls cancelled.
   */
  cancelAll(): number {
    let count = 0;
    for (const correlationId of Array.from(this.pending.keys())) {
      if (this.cancel(correlationId)) count++;
    }
    return count;
  }

  /**
   * Fail every outstanding call as unavailable.
   */
  failAll(message: string): number {
    let count = 0;
    for (const correlationId of Array.from(this.pending.keys())) {
      if (this.fail(correlationId, message)) count++;
    }
    return count;
  }

  /** Whether a call with this id is outstanding */
  has(correlationId: string): boolean {
    return this.pending.has(correlationId);
  }

  /** Snapshot of an outstanding call */
  get(correlationId: string): PendingCall | undefined {
    const entry = this.pending.get(correlationId);
    if (!entry) return undefined;
    const { settle: _settle, timer: _timer, ...view } = entry;
    return view;
  }

  /** Number of outstanding calls */
  get size(): number {
    return this.pending.size;
  }

  private settle(correlationId: string, outcome: CallOutcome): boolean {
    const entry = this.pending.get(correlationId);
    if (!entry) return false;

    clearTimeout(entry.timer);
    this.pending.delete(correlationId);
    entry.settle(outcome);
    return true;
  }
}

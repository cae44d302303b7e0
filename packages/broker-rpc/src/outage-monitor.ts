/**
 * Outage Monitor
 *
 * Turns a stream of per-call infrastructure failures into at most one
 * administrative alert per outage. An outage starts when `threshold`
 * consecutive failures are recorded and ends on the next success.
 *
 * @module outage-monitor
 */

import type { Logger } from 'pino';
import { errorMessage } from './errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Alert severity levels */
export type AlertSeverity = 'info' | 'warning' | 'critical';

/** An alert for the administrative recipient */
export interface AdminAlert {
  /** Stable alert name, e.g. `transport_outage` */
  name: string;
  severity: AlertSeverity;
  message: string;
  context?: Record<string, unknown>;
  timestamp: Date;
}

/** Administrative notification channel */
export interface AdminNotifier {
  notify(alert: AdminAlert): Promise<void>;
}

/** Options for OutageMonitor */
export interface OutageMonitorOptions {
  /** Component being watched, used in alert names (e.g. `transport`) */
  name: string;

  notifier: AdminNotifier;
  logger: Logger;

  /** Consecutive failures that make an outage (default: 1) */
  threshold?: number;

  /** Send an info alert when the outage ends (default: true) */
  notifyRecovery?: boolean;
}

// ---------------------------------------------------------------------------
// OutageMonitor
// ---------------------------------------------------------------------------

export class OutageMonitor {
  readonly name: string;
  private readonly notifier: AdminNotifier;
  private readonly logger: Logger;
  private readonly threshold: number;
  private readonly notifyRecovery: boolean;

  private consecutiveFailures = 0;
  private outageStartedAt: number | null = null;
  private _outages = 0;
  private delivery: Promise<void> = Promise.resolve();

  constructor(options: OutageMonitorOptions) {
    this.name = options.name;
    this.notifier = options.notifier;
    this.logger = options.logger.child({ component: 'outage-monitor', monitor: options.name });
    this.threshold = Math.max(1, options.threshold ?? 1);
    this.notifyRecovery = options.notifyRecovery ?? true;
  }

  /** Whether an outage is in progress */
  get inOutage(): boolean {
    return this.outageStartedAt !== null;
  }

  /** Number of outages declared since construction */
  get outages(): number {
    return this._outages;
  }

  /** Current run of failures without a success */
  get failureStreak(): number {
    return this.consecutiveFailures;
  }

  /**
   * Record an infrastructure failure. Alerts only when this failure starts
   * a new outage.
   */
  recordFailure(err: unknown, context?: Record<string, unknown>): void {
    this.consecutiveFailures++;

    if (this.outageStartedAt !== null || this.consecutiveFailures < this.threshold) {
      return;
    }

    this.outageStartedAt = Date.now();
    this._outages++;
    const message = `${this.name} unavailable: ${errorMessage(err)}`;
    this.logger.error({ consecutiveFailures: this.consecutiveFailures }, message);

    this.dispatch({
      name: `${this.name}_outage`,
      severity: 'critical',
      message,
      context: { ...context, consecutiveFailures: this.consecutiveFailures },
      timestamp: new Date(this.outageStartedAt),
    });
  }

  /**
   * Record a success. Ends an ongoing outage.
   */
  recordSuccess(): void {
    this.consecutiveFailures = 0;
    if (this.outageStartedAt === null) return;

    const durationMs = Date.now() - this.outageStartedAt;
    this.outageStartedAt = null;
    this.logger.info({ durationMs }, `${this.name} recovered`);

    if (this.notifyRecovery) {
      this.dispatch({
        name: `${this.name}_recovered`,
        severity: 'info',
        message: `${this.name} recovered after ${Math.round(durationMs / 1000)}s`,
        context: { durationMs },
        timestamp: new Date(),
      });
    }
  }

  /**
   * Wait for queued notifications to be delivered.
   */
  flush(): Promise<void> {
    return this.delivery;
  }

  private dispatch(alert: AdminAlert): void {
    this.delivery = this.delivery
      .then(() => this.notifier.notify(alert))
      .catch((err: unknown) => {
        this.logger.error(
          { alert: alert.name, error: errorMessage(err) },
          'Failed to deliver admin alert',
        );
      });
  }
}

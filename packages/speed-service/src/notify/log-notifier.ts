import type { Logger } from 'pino';
import type { AdminAlert, AdminNotifier } from '@speed-rpc/broker-rpc';

/**
 * Writes alerts to the log. Used when no chat bot is configured.
 */
export class LogAdminNotifier implements AdminNotifier {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'admin-alerts' });
  }

  async notify(alert: AdminAlert): Promise<void> {
    const entry = { alert: alert.name, context: alert.context, at: alert.timestamp.toISOString() };
    switch (alert.severity) {
      case 'critical':
        this.logger.error(entry, `[ALERT] ${alert.message}`);
        break;
      case 'warning':
        this.logger.warn(entry, `[ALERT] ${alert.message}`);
        break;
      default:
        this.logger.info(entry, `[ALERT] ${alert.message}`);
    }
  }
}

import type { AdminAlert } from '@speed-rpc/broker-rpc';

/**
 * Render an alert as plain text, one context entry per line.
 */
export function formatAlert(alert: AdminAlert): string {
  const lines = [`[${alert.severity.toUpperCase()}] ${alert.name}`, alert.message];
  for (const [key, value] of Object.entries(alert.context ?? {})) {
    lines.push(`${key}: ${typeof value === 'string' ? value : JSON.stringify(value)}`);
  }
  lines.push(alert.timestamp.toISOString());
  return lines.join('\n');
}

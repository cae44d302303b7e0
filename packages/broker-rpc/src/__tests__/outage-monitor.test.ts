import { describe, it, expect } from 'vitest';
import { OutageMonitor } from '../outage-monitor.js';
import type { AdminAlert, AdminNotifier } from '../outage-monitor.js';
import { RecordingNotifier, silentLogger } from './helpers.js';

function makeMonitor(threshold?: number, notifyRecovery?: boolean) {
  const notifier = new RecordingNotifier();
  const monitor = new OutageMonitor({
    name: 'transport',
    notifier,
    logger: silentLogger(),
    threshold,
    notifyRecovery,
  });
  return { notifier, monitor };
}

describe('OutageMonitor', () => {
  it('sends one alert per outage, not per failure', async () => {
    const { notifier, monitor } = makeMonitor();

    monitor.recordFailure(new Error('connection refused'));
    monitor.recordFailure(new Error('connection refused'));
    monitor.recordFailure(new Error('connection refused'));
    await monitor.flush();

    expect(notifier.alerts).toHaveLength(1);
    expect(notifier.alerts[0]).toMatchObject({
      name: 'transport_outage',
      severity: 'critical',
      message: 'transport unavailable: connection refused',
      context: { consecutiveFailures: 1 },
    });
    expect(monitor.inOutage).toBe(true);
    expect(monitor.failureStreak).toBe(3);
  });

  it('waits for the threshold before declaring an outage', async () => {
    const { notifier, monitor } = makeMonitor(3);

    monitor.recordFailure('timeout');
    monitor.recordFailure('timeout');
    await monitor.flush();
    expect(notifier.alerts).toHaveLength(0);
    expect(monitor.inOutage).toBe(false);

    monitor.recordFailure('timeout');
    await monitor.flush();
    expect(notifier.alerts.map((a) => a.name)).toEqual(['transport_outage']);
  });

  it('resets the streak on success below the threshold', async () => {
    const { notifier, monitor } = makeMonitor(2);

    monitor.recordFailure('x');
    monitor.recordSuccess();
    monitor.recordFailure('x');
    await monitor.flush();

    expect(notifier.alerts).toHaveLength(0);
    expect(monitor.failureStreak).toBe(1);
  });

  it('sends a recovery notice and alerts again on the next outage', async () => {
    const { notifier, monitor } = makeMonitor();

    monitor.recordFailure(new Error('down'));
    monitor.recordSuccess();
    monitor.recordSuccess();
    monitor.recordFailure(new Error('down again'));
    await monitor.flush();

    expect(notifier.alerts.map((a) => [a.name, a.severity])).toEqual([
      ['transport_outage', 'critical'],
      ['transport_recovered', 'info'],
      ['transport_outage', 'critical'],
    ]);
    expect(monitor.outages).toBe(2);
  });

  it('skips the recovery notice when disabled', async () => {
    const { notifier, monitor } = makeMonitor(1, false);

    monitor.recordFailure('down');
    monitor.recordSuccess();
    await monitor.flush();

    expect(notifier.alerts.map((a) => a.name)).toEqual(['transport_outage']);
  });

  it('keeps working when the notifier fails', async () => {
    const seen: AdminAlert[] = [];
    let calls = 0;
    const notifier: AdminNotifier = {
      async notify(alert) {
        calls++;
        if (calls === 1) throw new Error('chat API down');
        seen.push(alert);
      },
    };
    const monitor = new OutageMonitor({ name: 'storage', notifier, logger: silentLogger() });

    monitor.recordFailure('disk quota');
    monitor.recordSuccess();
    await monitor.flush();

    expect(seen.map((a) => a.name)).toEqual(['storage_recovered']);
  });
});

import { describe, it, expect, vi } from 'vitest';
import { connectWithRetry } from '../transport/connect.js';
import { ExponentialBackoff } from '../retry-policy.js';
import { OutageMonitor } from '../outage-monitor.js';
import { TransportError } from '../errors.js';
import { RecordingNotifier, silentLogger } from './helpers.js';

const noSleep = async (): Promise<void> => undefined;

describe('connectWithRetry', () => {
  it('returns the connection once an attempt succeeds', async () => {
    let attempts = 0;
    const connect = vi.fn(async () => {
      attempts++;
      if (attempts < 3) throw new Error('ECONNREFUSED');
      return 'connection';
    });

    const result = await connectWithRetry(connect, {
      policy: new ExponentialBackoff({ maxAttempts: 5 }),
      logger: silentLogger(),
      sleep: noSleep,
    });

    expect(result).toBe('connection');
    expect(connect).toHaveBeenCalledTimes(3);
  });

  it('throws a TransportError after the last attempt', async () => {
    const connect = vi.fn(async (): Promise<string> => {
      throw new Error('ECONNREFUSED');
    });

    const error = await connectWithRetry(connect, {
      policy: new ExponentialBackoff({ maxAttempts: 4 }),
      logger: silentLogger(),
      sleep: noSleep,
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransportError);
    expect((error as TransportError).message).toBe(
      'Broker unreachable after 4 attempt(s): ECONNREFUSED',
    );
    expect(connect).toHaveBeenCalledTimes(4);
  });

  it('raises one outage alert and one recovery notice', async () => {
    const notifier = new RecordingNotifier();
    const monitor = new OutageMonitor({ name: 'transport', notifier, logger: silentLogger() });
    let attempts = 0;

    await connectWithRetry(
      async () => {
        attempts++;
        if (attempts <= 3) throw new Error('ECONNREFUSED');
        return 'connection';
      },
      {
        policy: new ExponentialBackoff({ maxAttempts: 5 }),
        logger: silentLogger(),
        monitor,
        sleep: noSleep,
      },
    );
    await monitor.flush();

    expect(notifier.alerts.map((a) => a.name)).toEqual(['transport_outage', 'transport_recovered']);
    expect(notifier.alerts[0]?.context).toEqual({ attempt: 1, consecutiveFailures: 1 });
  });
});

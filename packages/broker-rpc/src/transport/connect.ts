/**
 * Bounded reconnect for broker connections.
 */

import type { Logger } from 'pino';
import { TransportError, errorMessage } from '../errors.js';
import { RetryExhaustedError, retry } from '../retry-policy.js';
import type { RetryPolicy, SleepFn } from '../retry-policy.js';
import type { OutageMonitor } from '../outage-monitor.js';

export interface ConnectWithRetryOptions {
  policy: RetryPolicy;
  logger: Logger;

  /** Told about every failed attempt and the eventual success */
  monitor?: OutageMonitor;

  sleep?: SleepFn;
}

/**
 * Call `connect` until it succeeds or the policy is exhausted.
 *
 * @throws TransportError after the last failed attempt.
 */
export async function connectWithRetry<T>(
  connect: () => Promise<T>,
  options: ConnectWithRetryOptions,
): Promise<T> {
  const logger = options.logger.child({ component: 'connect' });

  try {
    const connection = await retry(
      async (attempt) => {
        try {
          return await connect();
        } catch (err) {
          options.monitor?.recordFailure(err, { attempt });
          throw err;
        }
      },
      {
        policy: options.policy,
        sleep: options.sleep,
        onRetry: (err, attempt, delayMs) => {
          logger.warn(
            { attempt, maxAttempts: options.policy.maxAttempts, delayMs, error: errorMessage(err) },
            'Broker connection failed, retrying',
          );
        },
      },
    );
    options.monitor?.recordSuccess();
    return connection;
  } catch (err) {
    const attempts = err instanceof RetryExhaustedError ? err.attempts : 1;
    const cause = err instanceof RetryExhaustedError ? err.lastError : err;
    logger.error({ attempts, error: errorMessage(cause) }, 'Giving up connecting to broker');
    throw new TransportError(
      `Broker unreachable after ${attempts} attempt(s): ${errorMessage(cause)}`,
      { cause },
    );
  }
}

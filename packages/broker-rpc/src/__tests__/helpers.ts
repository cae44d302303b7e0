import { pino } from 'pino';
import type { Logger } from 'pino';
import type { AdminAlert, AdminNotifier } from '../outage-monitor.js';

/** Logger that writes nothing */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

/** Notifier that keeps every alert it receives */
export class RecordingNotifier implements AdminNotifier {
  readonly alerts: AdminAlert[] = [];

  async notify(alert: AdminAlert): Promise<void> {
    this.alerts.push(alert);
  }
}

/** Promise with its resolve function exposed */
export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/** Let queued microtasks and immediate callbacks run */
export function flushAsync(): Promise<void> {
  return new Promise((resolve) => {
    setImmediate(resolve);
  });
}

/** Poll until `predicate` holds or `timeoutMs` passes */
export async function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const started = Date.now();
  while (!predicate()) {
    if (Date.now() - started > timeoutMs) {
      throw new Error('waitFor: condition not met in time');
    }
    await new Promise((resolve) => {
      setTimeout(resolve, 5);
    });
  }
}

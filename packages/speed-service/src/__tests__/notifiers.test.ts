import { describe, it, expect } from 'vitest';
import { pino } from 'pino';
import type { AdminAlert } from '@speed-rpc/broker-rpc';
import { TelegramAdminNotifier } from '../notify/telegram-notifier.js';
import { LogAdminNotifier } from '../notify/log-notifier.js';
import { formatAlert } from '../notify/format.js';
import { fakeFetch, silentLogger } from './helpers/index.js';

const ALERT: AdminAlert = {
  name: 'transport_outage',
  severity: 'critical',
  message: 'transport unavailable: down',
  context: { queue: 'rpc_queue', consecutiveFailures: 1 },
  timestamp: new Date('2024-05-15T10:00:00Z'),
};

describe('formatAlert', () => {
  it('renders one line per field', () => {
    expect(formatAlert(ALERT)).toBe(
      [
        '[CRITICAL] transport_outage',
        'transport unavailable: down',
        'queue: rpc_queue',
        'consecutiveFailures: 1',
        '2024-05-15T10:00:00.000Z',
      ].join('\n'),
    );
  });
});

describe('TelegramAdminNotifier', () => {
  function notifier(fetchFn: typeof fetch) {
    return new TelegramAdminNotifier({
      botToken: 'test-token',
      chatId: 42,
      logger: silentLogger(),
      fetchFn,
    });
  }

  it('posts the alert to sendMessage', async () => {
    const { fetchFn, calls } = fakeFetch(
      () => new Response(JSON.stringify({ ok: true, result: {} })),
    );

    await notifier(fetchFn).notify(ALERT);

    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe('https://api.telegram.org/bottest-token/sendMessage');
    expect(calls[0]?.init?.method).toBe('POST');
    expect(JSON.parse(String(calls[0]?.init?.body))).toEqual({
      chat_id: 42,
      text: formatAlert(ALERT),
      disable_web_page_preview: true,
    });
  });

  it('throws with the API description on rejection', async () => {
    const { fetchFn } = fakeFetch(
      () =>
        new Response(
          JSON.stringify({ ok: false, description: 'Bad Request: chat not found' }),
          { status: 400 },
        ),
    );

    await expect(notifier(fetchFn).notify(ALERT)).rejects.toThrow(
      'sendMessage failed (400): Bad Request: chat not found',
    );
  });

  it('throws on a response that is not JSON', async () => {
    const { fetchFn } = fakeFetch(() => new Response('oops', { status: 500 }));

    await expect(notifier(fetchFn).notify(ALERT)).rejects.toThrow(
      'sendMessage failed (500): unexpected response',
    );
  });
});

describe('LogAdminNotifier', () => {
  function capture() {
    const lines: Array<Record<string, unknown>> = [];
    const logger = pino(
      { level: 'info' },
      {
        write: (msg: string) => {
          lines.push(JSON.parse(msg));
        },
      },
    );
    return { lines, notifier: new LogAdminNotifier(logger) };
  }

  it('logs critical alerts at error level', async () => {
    const { lines, notifier } = capture();

    await notifier.notify(ALERT);

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 50,
      component: 'admin-alerts',
      alert: 'transport_outage',
      msg: '[ALERT] transport unavailable: down',
    });
  });

  it('logs warnings at warn level and info alerts at info level', async () => {
    const { lines, notifier } = capture();

    await notifier.notify({ ...ALERT, severity: 'warning' });
    await notifier.notify({
      ...ALERT,
      name: 'transport_recovered',
      severity: 'info',
      message: 'back',
    });

    expect(lines.map((l) => l['level'])).toEqual([40, 30]);
    expect(lines[1]?.['msg']).toBe('[ALERT] back');
  });
});

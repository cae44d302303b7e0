/**
 * Chat bot notifier.
 *
 * Posts alerts to the administrative chat through the Telegram Bot API
 * `sendMessage` method.
 *
 * @module notify/telegram-notifier
 */

import { z } from 'zod';
import type { Logger } from 'pino';
import type { AdminAlert, AdminNotifier } from '@speed-rpc/broker-rpc';
import { formatAlert } from './format.js';

const sendMessageResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
});

export interface TelegramNotifierOptions {
  botToken: string;

  /** Chat id of the administrative recipient */
  chatId: number;

  logger: Logger;

  /** API root (default: https://api.telegram.org) */
  apiBaseUrl?: string;

  /** Request timeout in ms (default: 10000) */
  timeoutMs?: number;

  /** Custom fetch (for testing) */
  fetchFn?: typeof fetch;
}

export class TelegramAdminNotifier implements AdminNotifier {
  private readonly botToken: string;
  private readonly chatId: number;
  private readonly apiBaseUrl: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly fetchFn: typeof fetch;

  constructor(options: TelegramNotifierOptions) {
    this.botToken = options.botToken;
    this.chatId = options.chatId;
    this.apiBaseUrl = (options.apiBaseUrl ?? 'https://api.telegram.org').replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.logger = options.logger.child({ component: 'telegram-notifier' });
    this.fetchFn = options.fetchFn ?? globalThis.fetch;
  }

  /**
   * Send one alert.
   *
   * @throws Error if the API rejects the message or cannot be reached.
   */
  async notify(alert: AdminAlert): Promise<void> {
    const response = await this.fetchFn(`${this.apiBaseUrl}/bot${this.botToken}/sendMessage`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        chat_id: this.chatId,
        text: formatAlert(alert),
        disable_web_page_preview: true,
      }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    const raw: unknown = await response.json().catch(() => null);
    const parsed = sendMessageResponseSchema.safeParse(raw);

    if (!response.ok || !parsed.success || !parsed.data.ok) {
      const description = parsed.success ? parsed.data.description : undefined;
      throw new Error(
        `sendMessage failed (${response.status}): ${description ?? 'unexpected response'}`,
      );
    }

    this.logger.debug({ alert: alert.name, chatId: this.chatId }, 'Alert delivered');
  }
}

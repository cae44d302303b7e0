export { TelegramAdminNotifier } from './telegram-notifier.js';
export type { TelegramNotifierOptions } from './telegram-notifier.js';
export { LogAdminNotifier } from './log-notifier.js';
export { formatAlert } from './format.js';

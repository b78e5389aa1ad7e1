/**
 * Types for Notification Service
 */

import type TelegramBot from 'node-telegram-bot-api';

/**
 * Configuration for the Telegram client
 */
export interface TelegramClientConfig {
  botToken: string;
  chatId: string;
}

/**
 * The part of the bot API the client calls
 */
export type TelegramBotApi = Pick<TelegramBot, 'sendMessage' | 'getMe'>;

/**
 * What the poller needs from the notification layer.
 * Implementations resolve to false instead of rejecting when delivery fails.
 */
export interface Notifier {
  notify(message: string): Promise<boolean>;
  notifyError(error: Error): Promise<boolean>;
}

/**
 * Telegram Client
 *
 * Handles communication with Telegram Bot API.
 * A failed send is logged and reported as `false`; it never throws.
 */

import TelegramBot from 'node-telegram-bot-api';
import { logger, maskSecret } from '../logger.js';
import type { TelegramBotApi, TelegramClientConfig } from './types.js';

export class TelegramClient {
  private bot: TelegramBotApi;
  private chatId: string;

  constructor(config: TelegramClientConfig, bot?: TelegramBotApi) {
    this.bot = bot ?? new TelegramBot(config.botToken);
    this.chatId = config.chatId;

    logger.info('Telegram client initialized', {
      chatId: maskSecret(config.chatId),
    });
  }

  /**
   * Send a plain-text message to the configured chat
   * Returns true if message was sent successfully
   */
  public async sendMessage(text: string): Promise<boolean> {
    try {
      await this.bot.sendMessage(this.chatId, text);
      logger.info('Отправлено сообщение в чат');
      return true;
    } catch (error) {
      logger.error('Сбой при отправлении сообщения', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  /**
   * Verify the bot token is valid
   */
  public async verifyConnection(): Promise<boolean> {
    try {
      const me = await this.bot.getMe();
      logger.info('Telegram bot verified', {
        username: me.username,
      });
      return true;
    } catch (error) {
      logger.error('Failed to verify Telegram bot', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}

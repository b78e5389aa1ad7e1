/**
 * Notification Service
 *
 * Output layer between the poller and Telegram: status messages,
 * failure reports and lifecycle announcements all go through here.
 */

import { logger } from '../logger.js';
import type { TelegramClient } from './TelegramClient.js';
import type { Notifier } from './types.js';
import {
  formatErrorMessage,
  formatStartupMessage,
  formatShutdownMessage,
} from './formatter.js';

export class NotificationService implements Notifier {
  private client: TelegramClient;

  constructor(client: TelegramClient) {
    this.client = client;

    logger.info('Notification Service initialized');
  }

  /**
   * Verify Telegram connection on startup
   */
  public async verifyConnection(): Promise<boolean> {
    return this.client.verifyConnection();
  }

  /**
   * Forward a homework status message to the chat
   */
  public async notify(message: string): Promise<boolean> {
    return this.client.sendMessage(message);
  }

  /**
   * Send error notification
   */
  public async notifyError(error: Error): Promise<boolean> {
    logger.warn('Sending error notification', { errorType: error.name });
    return this.client.sendMessage(formatErrorMessage(error));
  }

  /**
   * Send startup notification
   */
  public async sendStartupNotification(retryTimeSeconds: number): Promise<boolean> {
    return this.client.sendMessage(formatStartupMessage(retryTimeSeconds));
  }

  /**
   * Send shutdown notification
   */
  public async sendShutdownNotification(reason: string): Promise<boolean> {
    return this.client.sendMessage(formatShutdownMessage(reason));
  }
}

/**
 * Common types for the homework status bot
 */

/**
 * Secrets the bot cannot run without
 */
export interface Credentials {
  /** OAuth token for the homework review API */
  apiToken: string;

  /** Telegram bot token */
  botToken: string;

  /** Chat that receives every notification */
  chatId: string;
}

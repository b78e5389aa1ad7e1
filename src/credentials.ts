/**
 * Token check run once before the bot starts.
 */

import type { Credentials } from './types.js';

const CREDENTIAL_KEYS = ['apiToken', 'botToken', 'chatId'] as const;

const ENV_NAMES: Record<keyof Credentials, string> = {
  apiToken: 'PRACTICUM_TOKEN',
  botToken: 'TELEGRAM_TOKEN',
  chatId: 'TELEGRAM_CHAT_ID',
};

/**
 * Names of the environment variables whose value is empty or absent
 */
export function findMissingCredentials(credentials: Partial<Credentials>): string[] {
  return CREDENTIAL_KEYS
    .filter((key) => !credentials[key])
    .map((key) => ENV_NAMES[key]);
}

/**
 * True when every credential the bot needs is present
 */
export function checkTokens(credentials: Partial<Credentials>): boolean {
  return findMissingCredentials(credentials).length === 0;
}

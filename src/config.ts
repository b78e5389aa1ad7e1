import { config as dotenvConfig } from 'dotenv';
import type { Credentials } from './types.js';

// Load environment variables
dotenvConfig();

type Env = Record<string, string | undefined>;

const DEFAULT_ENDPOINT = 'https://practicum.yandex.ru/api/user_api/homework_statuses/';

function getEnvVar(env: Env, key: string, defaultValue: string): string {
  const value = env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value;
}

function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number`);
  }
  return parsed;
}

function getEnvBoolean(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value.toLowerCase() === 'true';
}

/**
 * Build the bot configuration from an environment map.
 *
 * Secrets fall back to empty strings: whether the process may start
 * is decided by the token check in credentials.ts, not here.
 */
export function loadConfig(env: Env = process.env) {
  return {
    // Homework review API
    practicum: {
      token: getEnvVar(env, 'PRACTICUM_TOKEN', ''),
      endpoint: getEnvVar(env, 'PRACTICUM_ENDPOINT', DEFAULT_ENDPOINT),

      /** Abort the status request after this many milliseconds */
      requestTimeoutMs: getEnvNumber(env, 'REQUEST_TIMEOUT_MS', 30000),
    },

    // Telegram Configuration
    telegram: {
      botToken: getEnvVar(env, 'TELEGRAM_TOKEN', ''),
      chatId: getEnvVar(env, 'TELEGRAM_CHAT_ID', ''),

      /** Announce startup and shutdown in the chat */
      lifecycleNotifications: getEnvBoolean(env, 'NOTIFY_LIFECYCLE', false),
    },

    // Polling Configuration
    polling: {
      /** Pause between two iterations, in seconds */
      retryTimeSeconds: getEnvNumber(env, 'RETRY_TIME', 600),
    },

    // Logging Configuration
    logging: {
      level: getEnvVar(env, 'LOG_LEVEL', 'info'),
      toFile: getEnvBoolean(env, 'LOG_TO_FILE', true),
    },
  } as const;
}

export type Config = ReturnType<typeof loadConfig>;

export const config: Config = loadConfig();

export function credentialsFrom(cfg: Config): Credentials {
  return {
    apiToken: cfg.practicum.token,
    botToken: cfg.telegram.botToken,
    chatId: cfg.telegram.chatId,
  };
}

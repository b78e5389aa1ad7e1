export { NotificationService } from './NotificationService.js';
export { TelegramClient } from './TelegramClient.js';
export {
  formatErrorMessage,
  formatStartupMessage,
  formatShutdownMessage,
} from './formatter.js';
export type { TelegramClientConfig, TelegramBotApi, Notifier } from './types.js';

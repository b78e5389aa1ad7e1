/**
 * Message Formatter
 *
 * Texts for the operator-facing messages. Homework status messages
 * are built in homework/formatter.ts.
 */

/**
 * Format a polling failure for the chat
 */
export function formatErrorMessage(error: Error): string {
  return `Сбой в работе программы: ${error.message}`;
}

/**
 * Format a startup notification
 */
export function formatStartupMessage(retryTimeSeconds: number): string {
  return `Бот запущен. Статусы домашних работ проверяются каждые ${retryTimeSeconds} с.`;
}

/**
 * Format a shutdown notification
 */
export function formatShutdownMessage(reason: string): string {
  return `Бот остановлен. Причина: ${reason}`;
}

/**
 * Tests for NotificationService
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { NotificationService } from '../../src/notification/NotificationService.js';
import { TelegramClient } from '../../src/notification/TelegramClient.js';
import { ConnectionNot200Error } from '../../src/homework/errors.js';

describe('NotificationService', () => {
  let service: NotificationService;
  let bot: {
    sendMessage: ReturnType<typeof vi.fn>;
    getMe: ReturnType<typeof vi.fn>;
  };

  beforeEach(() => {
    bot = {
      sendMessage: vi.fn().mockResolvedValue({ message_id: 1 }),
      getMe: vi.fn().mockResolvedValue({ id: 1, is_bot: true, first_name: 'bot' }),
    };
    service = new NotificationService(
      new TelegramClient({ botToken: 'test-bot-token', chatId: '424242' }, bot)
    );
  });

  it('should forward status messages unchanged', async () => {
    await expect(service.notify('Изменился статус')).resolves.toBe(true);

    expect(bot.sendMessage).toHaveBeenCalledWith('424242', 'Изменился статус');
  });

  it('should format failure reports', async () => {
    await service.notifyError(new ConnectionNot200Error(503));

    expect(bot.sendMessage).toHaveBeenCalledWith(
      '424242',
      'Сбой в работе программы: API возвращает код 503, отличный от 200'
    );
  });

  it('should resolve to false when the bot API is unreachable', async () => {
    bot.sendMessage.mockRejectedValueOnce(new Error('getaddrinfo ENOTFOUND api.telegram.org'));

    await expect(service.notifyError(new Error('boom'))).resolves.toBe(false);
  });

  it('should send lifecycle messages', async () => {
    await service.sendStartupNotification(600);
    await service.sendShutdownNotification('Received SIGTERM');

    expect(bot.sendMessage).toHaveBeenNthCalledWith(
      1,
      '424242',
      'Бот запущен. Статусы домашних работ проверяются каждые 600 с.'
    );
    expect(bot.sendMessage).toHaveBeenNthCalledWith(
      2,
      '424242',
      'Бот остановлен. Причина: Received SIGTERM'
    );
  });

  it('should verify the connection through the client', async () => {
    await expect(service.verifyConnection()).resolves.toBe(true);
    expect(bot.getMe).toHaveBeenCalledTimes(1);
  });
});

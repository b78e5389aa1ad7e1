/**
 * Application
 *
 * Wires the modules together:
 * Practicum API Client → Homework Poller → Notification Service
 */

import { logger } from './logger.js';
import type { Config } from './config.js';
import { PracticumApiClient } from './api/index.js';
import { HomeworkPoller } from './homework/index.js';
import type { PollerState, PollOutcome } from './homework/index.js';
import { isClockPlausible } from './clock.js';
import { NotificationService, TelegramClient } from './notification/index.js';

export interface PollStats {
  /** Status messages that reached the chat */
  delivered: number;

  /** Status messages the chat never received */
  unsent: number;

  /** Homework records that could not be formatted */
  failedItems: number;

  /** Iterations that ended without a batch to deliver */
  noChange: number;

  /** Iterations that failed as a whole */
  failedPolls: number;
}

export function emptyPollStats(): PollStats {
  return { delivered: 0, unsent: 0, failedItems: 0, noChange: 0, failedPolls: 0 };
}

/**
 * Fold one iteration outcome into the running counters
 */
export function recordOutcome(stats: PollStats, outcome: PollOutcome): PollStats {
  switch (outcome.type) {
    case 'delivered':
      return {
        ...stats,
        delivered: stats.delivered + outcome.delivered,
        unsent: stats.unsent + outcome.unsent,
        failedItems: stats.failedItems + outcome.failed,
      };
    case 'no-change':
      return { ...stats, noChange: stats.noChange + 1 };
    case 'failed':
      return { ...stats, failedPolls: stats.failedPolls + 1 };
  }
}

export class App {
  private readonly config: Config;
  private apiClient: PracticumApiClient;
  private notificationService: NotificationService;
  private poller: HomeworkPoller;
  private stats: PollStats = emptyPollStats();

  constructor(config: Config) {
    this.config = config;

    // Initialize API client
    this.apiClient = new PracticumApiClient({
      token: config.practicum.token,
      endpoint: config.practicum.endpoint,
      requestTimeoutMs: config.practicum.requestTimeoutMs,
    });

    // Initialize Notification Service
    this.notificationService = new NotificationService(
      new TelegramClient({
        botToken: config.telegram.botToken,
        chatId: config.telegram.chatId,
      })
    );

    // Initialize Homework Poller
    this.poller = new HomeworkPoller(
      { retryTimeMs: config.polling.retryTimeSeconds * 1000 },
      this.apiClient,
      this.notificationService
    );

    this.setupPollerEvents();
  }

  private setupPollerEvents(): void {
    this.poller.on('pollCompleted', (outcome) => {
      this.stats = recordOutcome(this.stats, outcome);
    });
  }

  /**
   * Report a system clock that is obviously wrong; the initial cursor is taken from it
   */
  private async checkClock(): Promise<void> {
    const nowSeconds = Math.floor(Date.now() / 1000);
    if (isClockPlausible(nowSeconds)) return;

    const error = new Error(`Текущее время определено неправильно: ${nowSeconds}`);
    logger.error(error.message, { nowSeconds });
    await this.notificationService.notifyError(error);
  }

  /**
   * Start the bot. Resolves once the poller has been stopped.
   */
  public async run(): Promise<void> {
    logger.info('Starting homework status bot', {
      endpoint: this.config.practicum.endpoint,
      retryTimeSeconds: this.config.polling.retryTimeSeconds,
    });

    // A bad bot token only means messages will fail; the poller still runs
    const telegramOk = await this.notificationService.verifyConnection();
    if (!telegramOk) {
      logger.warn('Telegram connection could not be verified, continuing');
    }

    await this.checkClock();

    if (this.config.telegram.lifecycleNotifications) {
      await this.notificationService.sendStartupNotification(
        this.config.polling.retryTimeSeconds
      );
    }

    await this.poller.run();
  }

  /**
   * Stop the bot gracefully
   */
  public async stop(reason: string = 'Manual shutdown'): Promise<void> {
    if (!this.poller.getRunningStatus()) return;

    logger.info('Stopping homework status bot', { reason });
    this.poller.stop();

    if (this.config.telegram.lifecycleNotifications) {
      await this.notificationService.sendShutdownNotification(reason);
    }
  }

  public getStatus(): { isRunning: boolean } & PollerState & PollStats {
    return {
      isRunning: this.poller.getRunningStatus(),
      ...this.poller.getState(),
      ...this.stats,
    };
  }
}

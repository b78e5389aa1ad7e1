/**
 * Homework Poller
 *
 * Asks the review API for status changes on a fixed interval and
 * forwards every change to the chat.
 *
 * One iteration:
 *   fetch → validate → advance cursor → format each item → notify
 * followed by a fixed sleep, whatever the outcome.
 *
 * Failures are caught at the iteration boundary. Each one is logged;
 * it reaches the chat only if its kind differs from the last reported kind.
 */

import { EventEmitter } from 'eventemitter3';
import { logger } from '../logger.js';
import type { Notifier } from '../notification/types.js';
import { errorKindOf, isExpectedError, toError } from './errors.js';
import { parseStatus } from './formatter.js';
import { checkResponse } from './validator.js';
import type {
  HomeworkPollerConfig,
  HomeworkPollerEvents,
  HomeworkSource,
  PollerState,
  PollOutcome,
} from './types.js';

/**
 * Injectable side effects, replaced in tests
 */
export interface PollerDeps {
  sleep: (ms: number) => Promise<void>;
  now: () => number;
}

const defaultDeps: PollerDeps = {
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
  now: () => Date.now(),
};

export class HomeworkPoller extends EventEmitter<HomeworkPollerEvents> {
  private readonly config: HomeworkPollerConfig;
  private readonly source: HomeworkSource;
  private readonly notifier: Notifier;
  private readonly deps: PollerDeps;
  private state: PollerState;
  private isRunning = false;

  constructor(
    config: HomeworkPollerConfig,
    source: HomeworkSource,
    notifier: Notifier,
    deps: Partial<PollerDeps> = {}
  ) {
    super();
    this.config = config;
    this.source = source;
    this.notifier = notifier;
    this.deps = { ...defaultDeps, ...deps };
    this.state = {
      cursor: config.initialCursor ?? Math.floor(this.deps.now() / 1000),
      lastErrorKind: null,
    };

    logger.info('Homework Poller initialized', {
      cursor: this.state.cursor,
      retryTimeMs: config.retryTimeMs,
    });
  }

  /**
   * Poll until stop() is called. A failed iteration never ends the loop.
   */
  async run(): Promise<void> {
    if (this.isRunning) {
      logger.warn('Homework Poller already running');
      return;
    }

    this.isRunning = true;
    logger.info('Homework Poller started');

    while (this.isRunning) {
      try {
        await this.pollOnce();
      } catch (error) {
        // Only reachable when the notifier itself throws while reporting
        const normalizedError = toError(error);
        logger.error('Homework poll iteration crashed', {
          error: normalizedError.message,
          stack: normalizedError.stack,
        });
      } finally {
        await this.deps.sleep(this.config.retryTimeMs);
      }
    }

    logger.info('Homework Poller stopped');
  }

  /**
   * Ask the loop to exit after the current sleep
   */
  stop(): void {
    this.isRunning = false;
  }

  /**
   * Run exactly one iteration, without the trailing sleep
   */
  async pollOnce(): Promise<PollOutcome> {
    let outcome: PollOutcome;
    try {
      outcome = await this.iterate();
    } catch (error) {
      const normalizedError = toError(error);
      const reported = await this.reportFailure(normalizedError);
      outcome = {
        type: 'failed',
        cursor: this.state.cursor,
        kind: errorKindOf(normalizedError),
        reported,
      };
    }

    this.emit('pollCompleted', outcome);
    return outcome;
  }

  getState(): Readonly<PollerState> {
    return { ...this.state };
  }

  getRunningStatus(): boolean {
    return this.isRunning;
  }

  private async iterate(): Promise<PollOutcome> {
    const response = await this.source.getHomeworkStatuses(this.state.cursor);
    const check = checkResponse(response);

    if (check.outcome === 'invalid') {
      throw check.error;
    }

    // Advance before formatting: a bad item must not cause the batch to be fetched again
    this.state.cursor = check.currentDate;

    if (check.outcome === 'no-change') {
      logger.debug('Статус домашки не поменялся', { cursor: this.state.cursor });
      this.emit('noChange', this.state.cursor);
      return { type: 'no-change', cursor: this.state.cursor };
    }

    let delivered = 0;
    let unsent = 0;
    let failed = 0;

    for (const homework of check.homeworks) {
      let message: string;
      try {
        message = parseStatus(homework);
      } catch (error) {
        failed++;
        await this.reportFailure(toError(error));
        continue;
      }

      const sent = await this.notifier.notify(message);
      if (!sent) {
        unsent++;
        logger.warn('Homework status message not delivered', { message });
        continue;
      }

      delivered++;
      this.emit('statusChanged', message);
    }

    logger.info('Homework statuses processed', {
      cursor: this.state.cursor,
      delivered,
      unsent,
      failed,
    });

    return { type: 'delivered', cursor: this.state.cursor, delivered, unsent, failed };
  }

  /**
   * Log a failure and tell the chat about it unless the same kind was reported last.
   * Returns whether the chat was notified.
   */
  private async reportFailure(error: Error): Promise<boolean> {
    const kind = errorKindOf(error);

    if (isExpectedError(error)) {
      logger.error(`Сбой в работе программы: ${error.message}`, { kind });
    } else {
      logger.error(`Сбой в работе программы: ${error.message}`, { kind, stack: error.stack });
    }

    const isRepeat = kind === this.state.lastErrorKind;
    this.state.lastErrorKind = kind;

    if (isRepeat) {
      logger.debug('Repeated failure not sent to chat', { kind });
      this.emit('pollFailed', error, false);
      return false;
    }

    await this.notifier.notifyError(error);
    this.emit('pollFailed', error, true);
    return true;
  }
}

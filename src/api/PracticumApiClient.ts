/**
 * Practicum API Client
 *
 * Fetches homework status changes from the review API.
 */

import { logger, maskSecret } from '../logger.js';
import { ConnectionNot200Error } from '../homework/errors.js';
import type { HomeworkSource } from '../homework/types.js';
import type { FetchFn, PracticumApiClientConfig } from './types.js';

export class PracticumApiClient implements HomeworkSource {
  private readonly endpoint: string;
  private readonly token: string;
  private readonly requestTimeoutMs: number;
  private readonly fetchFn: FetchFn;

  constructor(config: PracticumApiClientConfig, fetchFn: FetchFn = fetch) {
    this.endpoint = config.endpoint;
    this.token = config.token;
    this.requestTimeoutMs = config.requestTimeoutMs;
    this.fetchFn = fetchFn;

    logger.info('Practicum API client initialized', {
      endpoint: config.endpoint,
      token: maskSecret(config.token),
    });
  }

  /**
   * Request every status change since `fromDate` (Unix seconds).
   * Resolves to the decoded JSON body; anything but HTTP 200 throws ConnectionNot200Error.
   */
  async getHomeworkStatuses(fromDate: number): Promise<unknown> {
    const url = new URL(this.endpoint);
    url.searchParams.set('from_date', String(fromDate));

    // Set up abort controller with timeout to prevent indefinite hangs
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.requestTimeoutMs);

    try {
      const response = await this.fetchFn(url, {
        headers: { Authorization: `OAuth ${this.token}` },
        signal: controller.signal,
      });

      if (response.status !== 200) {
        throw new ConnectionNot200Error(response.status);
      }

      logger.debug('Homework statuses fetched', { fromDate });
      const body: unknown = await response.json();
      return body;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

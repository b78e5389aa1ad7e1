/**
 * Types for the Homework Poller
 */

import type { ResponseShapeError } from './errors.js';

// ===========================================
// API Types
// ===========================================

/**
 * A homework review record as the API reports it
 */
export interface HomeworkItem {
  homework_name: string;
  status: string;
}

/**
 * Decoded body of the status endpoint
 */
export interface HomeworkApiResponse {
  homeworks: HomeworkItem[];
  current_date: number;
}

/**
 * Outcome of checking a decoded response.
 * `no-change` is the quiet case: nothing was reviewed since the cursor.
 */
export type ResponseCheck =
  | { outcome: 'homeworks'; homeworks: unknown[]; currentDate: number }
  | { outcome: 'no-change'; currentDate: number }
  | { outcome: 'invalid'; error: ResponseShapeError };

// ===========================================
// Poller Types
// ===========================================

/**
 * Anything that can return the raw status payload since a given instant
 */
export interface HomeworkSource {
  getHomeworkStatuses(fromDate: number): Promise<unknown>;
}

/**
 * Homework Poller configuration
 */
export interface HomeworkPollerConfig {
  /** Pause between two iterations in milliseconds */
  retryTimeMs: number;

  /** Unix seconds to start from (defaults to now) */
  initialCursor?: number;
}

/**
 * State carried from one iteration to the next
 */
export interface PollerState {
  /** Lower bound (Unix seconds) of the next request */
  cursor: number;

  /** Kind of the last reported failure; never reset once set */
  lastErrorKind: string | null;
}

/**
 * Result of a single iteration
 */
export type PollOutcome =
  | { type: 'delivered'; cursor: number; delivered: number; unsent: number; failed: number }
  | { type: 'no-change'; cursor: number }
  | { type: 'failed'; cursor: number; kind: string; reported: boolean };

/**
 * Events emitted by the Homework Poller
 */
export interface HomeworkPollerEvents {
  statusChanged: [message: string];
  noChange: [cursor: number];
  pollFailed: [error: Error, reported: boolean];
  pollCompleted: [outcome: PollOutcome];
}

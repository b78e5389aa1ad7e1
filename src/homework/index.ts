/**
 * Homework Module
 *
 * Polls the review API and turns status changes into chat messages.
 */

// Types
export type {
  HomeworkItem,
  HomeworkApiResponse,
  ResponseCheck,
  HomeworkSource,
  HomeworkPollerConfig,
  PollerState,
  PollOutcome,
  HomeworkPollerEvents,
} from './types.js';
export type { ErrorKind, ResponseErrorKind, WorkItemErrorKind } from './errors.js';
export type { HomeworkStatus } from './statuses.js';

// Classes and functions
export { HomeworkPoller } from './HomeworkPoller.js';
export type { PollerDeps } from './HomeworkPoller.js';
export { HOMEWORK_VERDICTS, isKnownStatus } from './statuses.js';
export { checkResponse } from './validator.js';
export { parseStatus } from './formatter.js';
export {
  HomeworkBotError,
  ConnectionNot200Error,
  ResponseShapeError,
  WorkItemError,
  errorKindOf,
} from './errors.js';

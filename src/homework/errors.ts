/**
 * Error kinds raised while polling.
 *
 * Duplicate-notification suppression compares kinds only, so two
 * failures of the same kind with different messages count as one.
 */

export type ResponseErrorKind =
  | 'NotAMapping'
  | 'MissingHomeworks'
  | 'HomeworksNotASequence'
  | 'InvalidCurrentDate';

export type WorkItemErrorKind =
  | 'MalformedWorkItem'
  | 'MissingName'
  | 'MissingStatus'
  | 'UnknownStatus';

export type ErrorKind = 'ConnectionNot200' | ResponseErrorKind | WorkItemErrorKind;

export class HomeworkBotError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string) {
    super(message);
    this.name = kind;
    this.kind = kind;
  }
}

/**
 * The status API answered with anything but 200
 */
export class ConnectionNot200Error extends HomeworkBotError {
  readonly statusCode: number;

  constructor(statusCode: number) {
    super('ConnectionNot200', `API возвращает код ${statusCode}, отличный от 200`);
    this.statusCode = statusCode;
  }
}

export class ResponseShapeError extends HomeworkBotError {
  declare readonly kind: ResponseErrorKind;

  constructor(kind: ResponseErrorKind, message: string) {
    super(kind, `Ошибка ответа API: ${message}`);
  }
}

export class WorkItemError extends HomeworkBotError {
  declare readonly kind: WorkItemErrorKind;

  constructor(kind: WorkItemErrorKind, message: string) {
    super(kind, message);
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Identity used to detect a repeated failure
 */
export function errorKindOf(error: unknown): string {
  if (error instanceof HomeworkBotError) {
    return error.kind;
  }
  if (error instanceof Error) {
    return error.name;
  }
  return 'UnknownError';
}

/**
 * Whether the failure is one of the bot's own, already described, kinds
 */
export function isExpectedError(error: unknown): error is HomeworkBotError {
  return error instanceof HomeworkBotError;
}

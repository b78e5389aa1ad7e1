/**
 * Status Formatter
 *
 * Turns one homework record into the message sent to the chat.
 */

import { WorkItemError } from './errors.js';
import { HOMEWORK_VERDICTS, isKnownStatus } from './statuses.js';
import { isRecord } from './validator.js';

/**
 * Build the notification text for a homework record.
 * Throws WorkItemError when the record is malformed or its status is not in the catalog.
 */
export function parseStatus(homework: unknown): string {
  if (!isRecord(homework)) {
    throw new WorkItemError('MalformedWorkItem', 'Запись о домашней работе не является словарём');
  }

  const name = homework['homework_name'];
  if (name === undefined || name === null) {
    throw new WorkItemError('MissingName', 'В записи о домашней работе нет homework_name');
  }
  if (typeof name !== 'string') {
    throw new WorkItemError('MalformedWorkItem', 'homework_name не является строкой');
  }

  const status = homework['status'];
  if (status === undefined || status === null) {
    throw new WorkItemError('MissingStatus', `У работы "${name}" нет статуса`);
  }
  if (typeof status !== 'string' || !isKnownStatus(status)) {
    throw new WorkItemError(
      'UnknownStatus',
      `Недокументированный статус домашней работы: ${String(status)}`
    );
  }

  const verdict = HOMEWORK_VERDICTS[status];
  return `Изменился статус проверки работы "${name}". ${verdict}`;
}

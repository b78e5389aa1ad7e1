/**
 * Response Validator
 *
 * Checks the decoded status payload before anything is taken from it.
 * The API is the only untrusted input, so any deviation from the
 * expected shape is rejected rather than coerced.
 */

import { ResponseShapeError } from './errors.js';
import type { ResponseCheck } from './types.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(error: ResponseShapeError): ResponseCheck {
  return { outcome: 'invalid', error };
}

/**
 * Validate a decoded API response and extract its homework list.
 * The list is returned as is; items are checked one by one when formatted.
 */
export function checkResponse(response: unknown): ResponseCheck {
  if (!isRecord(response)) {
    return invalid(new ResponseShapeError('NotAMapping', 'ответ не является словарём'));
  }

  if (!('homeworks' in response)) {
    return invalid(new ResponseShapeError('MissingHomeworks', 'в ответе нет ключа homeworks'));
  }

  const homeworks = response['homeworks'];
  if (!Array.isArray(homeworks)) {
    return invalid(new ResponseShapeError('HomeworksNotASequence', 'домашки не являются списком'));
  }

  const currentDate = response['current_date'];
  if (typeof currentDate !== 'number' || !Number.isInteger(currentDate)) {
    return invalid(
      new ResponseShapeError('InvalidCurrentDate', 'current_date не является целым числом')
    );
  }

  if (homeworks.length === 0) {
    return { outcome: 'no-change', currentDate };
  }

  return { outcome: 'homeworks', homeworks, currentDate };
}

/**
 * Homework Status Catalog
 *
 * Review status codes reported by the API and the verdict shown
 * to the user for each of them.
 */

export const HOMEWORK_VERDICTS = {
  approved: 'Работа проверена: ревьюеру всё понравилось. Ура!',
  reviewing: 'Работа взята на проверку ревьюером.',
  rejected: 'Работа проверена: у ревьюера есть замечания.',
} as const satisfies Record<string, string>;

export type HomeworkStatus = keyof typeof HOMEWORK_VERDICTS;

export function isKnownStatus(status: string): status is HomeworkStatus {
  return Object.prototype.hasOwnProperty.call(HOMEWORK_VERDICTS, status);
}

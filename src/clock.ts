/**
 * Sanity check for the system clock the cursor starts from.
 */

/** 2021-11-16T19:55:00Z; no earlier reading can be correct */
export const MIN_PLAUSIBLE_TIMESTAMP = 1637092500;

export function isClockPlausible(nowSeconds: number): boolean {
  return Number.isFinite(nowSeconds) && nowSeconds >= MIN_PLAUSIBLE_TIMESTAMP;
}

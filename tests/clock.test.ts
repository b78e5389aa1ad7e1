/**
 * Tests for the clock sanity check
 */

import { describe, it, expect } from 'vitest';
import { isClockPlausible, MIN_PLAUSIBLE_TIMESTAMP } from '../src/clock.js';

describe('isClockPlausible', () => {
  it('should accept the threshold and anything later', () => {
    expect(isClockPlausible(MIN_PLAUSIBLE_TIMESTAMP)).toBe(true);
    expect(isClockPlausible(1700000000)).toBe(true);
  });

  it('should reject a clock behind the threshold', () => {
    expect(isClockPlausible(MIN_PLAUSIBLE_TIMESTAMP - 1)).toBe(false);
    expect(isClockPlausible(0)).toBe(false);
  });

  it('should reject a non-finite reading', () => {
    expect(isClockPlausible(NaN)).toBe(false);
  });
});

/**
 * Category Labels and Colors
 *
 * Level order is fixed and never derived from the data, so a given
 * category always gets the same color.
 */

import type { CategoryCount, CategoryScale } from './types';

export const THREE_CLASS_LEVELS = ['b>1.2', '0.8<b<1.2', 'b<0.8'] as const;
export const THREE_CLASS_COLORS = ['darkgreen', 'yellow', 'red'] as const;

export const FOUR_CLASS_LEVELS = ['b>1,f<1', 'b>1,f>1', 'b<1,f<1', 'b<1,f>1'] as const;
export const FOUR_CLASS_COLORS = ['darkgreen', 'orange', 'yellow', 'red'] as const;

const THREE_CLASS_SCALE: CategoryScale = {
  count: 3,
  levels: THREE_CLASS_LEVELS,
  colors: THREE_CLASS_COLORS
};

const FOUR_CLASS_SCALE: CategoryScale = {
  count: 4,
  levels: FOUR_CLASS_LEVELS,
  colors: FOUR_CLASS_COLORS
};

export function categoryScale(count: CategoryCount): CategoryScale {
  return count === 3 ? THREE_CLASS_SCALE : FOUR_CLASS_SCALE;
}

/**
 * Positional label lookup: code 1 is the first level
 *
 * @returns the label, or null for a missing or out-of-range code
 */
export function labelFor(scale: CategoryScale, code: number | null): string | null {
  if (code === null || !Number.isInteger(code) || code < 1 || code > scale.levels.length) {
    return null;
  }
  return scale.levels[code - 1];
}

/**
 * Stock Status Types
 */

import type { StockTimeSeries } from '../data/types';

/** Biomass-only status: 1 = b>1.2, 2 = 0.8<b<1.2, 3 = b<0.8 */
export type Category3Code = 1 | 2 | 3;

/** Biomass and fishing mortality status, see FOUR_CLASS_LEVELS */
export type Category4Code = 1 | 2 | 3 | 4;

export type CategoryCount = 3 | 4;

export interface ClassifiedRow {
  stock: string;
  year: number;
  /** null when B/Bmsy is missing */
  estCat3: Category3Code | null;
  /** null when either ratio is missing */
  estCat4: Category4Code | null;
}

/**
 * Classifier collaborator
 *
 * Receives the renamed series and the method suffix, and returns one
 * classified row per observation, in input order.
 */
export type StatusClassifier = (series: StockTimeSeries, method: string) => ClassifiedRow[];

/**
 * Fixed label and color set for one classification granularity
 *
 * `colors[i]` is the color of `levels[i]`; code `i + 1` selects both.
 */
export interface CategoryScale {
  count: CategoryCount;
  levels: readonly string[];
  colors: readonly string[];
}

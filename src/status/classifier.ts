/**
 * Default Stock Status Classifier
 *
 * Thresholds:
 * - 3 classes on B/Bmsy alone: above 1.2, between 0.8 and 1.2 (inclusive),
 *   below 0.8
 * - 4 classes on B/Bmsy against 1 and F/Fmsy against 1; B/Bmsy of exactly
 *   1 counts as not overfished, F/Fmsy of exactly 1 as not overfishing
 */

import { getRatioColumn } from '../data/tables';
import type { StockTimeSeries } from '../data/types';
import type { Category3Code, Category4Code, ClassifiedRow } from './types';

export function biomassCategory(bbmsy: number | null): Category3Code | null {
  if (bbmsy === null) {
    return null;
  }
  if (bbmsy > 1.2) {
    return 1;
  }
  return bbmsy >= 0.8 ? 2 : 3;
}

export function combinedCategory(bbmsy: number | null, ffmsy: number | null): Category4Code | null {
  if (bbmsy === null || ffmsy === null) {
    return null;
  }
  const overfishing = ffmsy > 1;
  if (bbmsy >= 1) {
    return overfishing ? 2 : 1;
  }
  return overfishing ? 4 : 3;
}

/**
 * Classify every observation using the `bbmsy.<method>` and
 * `ffmsy.<method>` columns
 *
 * @throws MissingColumnError if either column is absent
 */
export function classifyStatus(series: StockTimeSeries, method: string): ClassifiedRow[] {
  const bbmsy = getRatioColumn(series, 'bbmsy', method);
  const ffmsy = getRatioColumn(series, 'ffmsy', method);

  return series.rows.map((row, i) => ({
    stock: row.stock,
    year: row.year,
    estCat3: biomassCategory(bbmsy[i]),
    estCat4: combinedCategory(bbmsy[i], ffmsy[i])
  }));
}

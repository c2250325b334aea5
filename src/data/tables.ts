/**
 * Table Reshaping
 *
 * Turns loosely typed tables into a StockTimeSeries and looks up ratio
 * columns by method suffix.
 *
 * Contract: the first two columns of any input table are reinterpreted as
 * `stock` and `year`, regardless of their names ("Stock", "yr", ...).
 */

import { z } from 'zod';
import { InvalidTableError, MissingColumnError } from '../errors';
import type { CellValue, DataRecord, DataTable, ObservationRow, StockTimeSeries } from './types';

// Cells that stand for a missing estimate
const MISSING_TOKENS = new Set(['', 'NA', 'NaN', 'Inf', '-Inf']);

const NUMBER_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

const StockSchema = z.union([
  z.string().trim().min(1),
  z.number().finite().transform(String)
]);

const YearSchema = z.union([
  z.number().int(),
  z.string().trim().regex(/^-?\d+$/).transform(Number)
]);

/**
 * Build a DataTable from plain objects
 *
 * Without `columns`, column order follows the keys of the first record.
 * Object key order puts integer-like keys (such as "2000") first, so pass
 * `columns` explicitly when a record has them; otherwise the wrong columns
 * are read as stock and year. Keys missing from a record read as null.
 *
 * @param columns - Column names in positional order (stock id, year, ...)
 */
export function fromRecords(records: DataRecord[], columns?: string[]): DataTable {
  if (columns === undefined && records.length === 0) {
    return { columns: [], rows: [] };
  }
  const order = columns ?? Object.keys(records[0]);
  const rows = records.map((record) => order.map((column) => record[column] ?? null));
  return { columns: order, rows };
}

export function isDataTable(value: DataTable | DataRecord[]): value is DataTable {
  return !Array.isArray(value);
}

/**
 * Apply the positional stock/year rename
 *
 * The input table is left untouched.
 *
 * @throws InvalidTableError if there are fewer than two columns, or a row
 *         has an unusable stock id or year
 */
export function toStockTimeSeries(table: DataTable): StockTimeSeries {
  if (table.columns.length < 2) {
    throw new InvalidTableError(
      `Expected at least 2 columns (stock, year), got ${table.columns.length}`
    );
  }

  const valueColumns = table.columns.slice(2);
  const rows = table.rows.map((cells, index): ObservationRow => {
    const stock = StockSchema.safeParse(cells[0]);
    if (!stock.success) {
      throw new InvalidTableError(`Row ${index + 1}: invalid stock id ${JSON.stringify(cells[0])}`);
    }
    const year = YearSchema.safeParse(cells[1]);
    if (!year.success) {
      throw new InvalidTableError(`Row ${index + 1}: invalid year ${JSON.stringify(cells[1])}`);
    }

    const values: Record<string, CellValue> = {};
    valueColumns.forEach((column, offset) => {
      values[column] = cells[offset + 2] ?? null;
    });
    return { stock: stock.data, year: year.data, values };
  });

  return { valueColumns, rows };
}

function toRatio(cell: CellValue, column: string, rowIndex: number): number | null {
  if (cell === null) {
    return null;
  }
  if (typeof cell === 'number') {
    return Number.isFinite(cell) ? cell : null;
  }
  const text = cell.trim();
  if (MISSING_TOKENS.has(text)) {
    return null;
  }
  if (!NUMBER_PATTERN.test(text)) {
    throw new InvalidTableError(
      `Row ${rowIndex + 1}: column ${column} is not numeric (${JSON.stringify(cell)})`
    );
  }
  return Number(text);
}

/**
 * Read the `<prefix>.<method>` column as ratios
 *
 * @example getRatioColumn(series, 'bbmsy', 'cmsy.naive') reads `bbmsy.cmsy.naive`
 * @throws MissingColumnError if the column is absent
 */
export function getRatioColumn(
  series: StockTimeSeries,
  prefix: string,
  method: string
): (number | null)[] {
  const column = `${prefix}.${method}`;
  if (!series.valueColumns.includes(column)) {
    throw new MissingColumnError(column);
  }
  return series.rows.map((row, index) => toRatio(row.values[column] ?? null, column, index));
}

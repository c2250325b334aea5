/**
 * Time Series Table Types
 *
 * A DataTable is positional: the first two columns are read as stock and
 * year whatever they are called. A StockTimeSeries is the same data after
 * that positional rename.
 */

export type CellValue = string | number | null;

export interface DataTable {
  /** Column names, in order */
  columns: string[];
  /** One array per row, aligned with `columns` */
  rows: CellValue[][];
}

/**
 * Plain-object rows, as produced by most JSON or CSV loaders
 */
export type DataRecord = Record<string, CellValue>;

export interface ObservationRow {
  stock: string;
  year: number;
  /** Every column after the first two, keyed by name */
  values: Record<string, CellValue>;
}

export interface StockTimeSeries {
  /** Names of the columns after stock and year, in input order */
  valueColumns: string[];
  rows: ObservationRow[];
}

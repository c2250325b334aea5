/**
 * Data Module
 *
 * Loading and reshaping of stock time series tables.
 */

export { fromRecords, isDataTable, toStockTimeSeries, getRatioColumn } from './tables';
export { parseTimeSeriesCsv } from './timeseriesParser';
export type {
  CellValue,
  DataTable,
  DataRecord,
  ObservationRow,
  StockTimeSeries
} from './types';

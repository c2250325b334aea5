/**
 * Error types
 *
 * Every failure raised by this package extends StockStatusError so callers
 * can tell them apart from unrelated errors with a single instanceof check.
 */

export class StockStatusError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StockStatusError';
  }
}

/**
 * Raised when a table cannot be read as a stock time series
 * (too few columns, a bad stock id or year, a non-numeric ratio).
 */
export class InvalidTableError extends StockStatusError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidTableError';
  }
}

/**
 * Raised when a `<prefix>.<method>` column is not present in the table.
 */
export class MissingColumnError extends StockStatusError {
  column: string;

  constructor(column: string) {
    super(`Missing column: ${column}`);
    this.name = 'MissingColumnError';
    this.column = column;
  }
}

export class UnsupportedChartTypeError extends StockStatusError {
  chartType: string;

  constructor(chartType: string) {
    super(`Unsupported chart type: "${chartType}" (expected "count", "prop", "stock" or "all")`);
    this.name = 'UnsupportedChartTypeError';
    this.chartType = chartType;
  }
}

export class ConfigError extends StockStatusError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

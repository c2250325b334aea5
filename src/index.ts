/**
 * Stock status plots
 *
 * Classifies stock assessment time series (B/Bmsy, F/Fmsy) into status
 * categories and builds Plotly chart specifications from them.
 */

export * from './plotting';
export * from './status';
export * from './data';
export {
  DEFAULT_PLOTTER_CONFIG,
  PlotterConfigSchema,
  loadPlotterConfig,
  resolvePlotterConfig
} from './config';
export type { PlotterConfig } from './config';
export {
  StockStatusError,
  InvalidTableError,
  MissingColumnError,
  UnsupportedChartTypeError,
  ConfigError
} from './errors';

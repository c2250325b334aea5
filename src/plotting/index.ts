/**
 * Plotting Module
 *
 * Exports all plotting utilities and types.
 * This is the main entry point for importing plotting functionality.
 */

export {
  CategoryPlotter,
  DEFAULT_METHOD,
  plotCat,
  plotProp,
  resolveCategoryCount,
  resolveChartType
} from './CategoryPlotter';
export { renderChart } from './renderChart';
export type {
  ChartKind,
  ChartTypeName,
  CountBarTrace,
  StatusChartSpec,
  StatusFigure,
  StatusHeatmapTrace,
  StatusRow,
  StatusTrace
} from './types';

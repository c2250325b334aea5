/**
 * Plotting Types
 *
 * Chart specifications are Plotly figures plus the data they were built
 * from, so they can be rendered by Plotly or handed to another renderer.
 */

import type { Config, Layout } from 'plotly.js';
import type { CategoryScale } from '../status/types';

/** Accepted chart type names, including the legacy synonyms */
export type ChartTypeName = 'count' | 'prop' | 'stock' | 'all';

/** Chart types after synonyms are resolved */
export type ChartKind = 'count' | 'stock';

/**
 * Stacked bar of observation counts for one category
 */
export interface CountBarTrace {
  type: 'bar';
  name: string;
  /** Distinct years, ascending */
  x: number[];
  /** Observations of this category per year */
  y: number[];
  width: number;
  marker: {
    color: string;
    line: { color: string; width: number };
  };
  hovertemplate: string;
}

/**
 * Stock-by-year raster of category codes
 */
export interface StatusHeatmapTrace {
  type: 'heatmap';
  /** Distinct years, ascending */
  x: number[];
  /** Distinct stocks, sorted */
  y: string[];
  /** z[stockIndex][yearIndex]: category code, null where no observation */
  z: (number | null)[][];
  zmin: number;
  zmax: number;
  colorscale: [number, string][];
  showscale: boolean;
  colorbar: {
    tickvals: number[];
    ticktext: string[];
  };
  hovertemplate: string;
}

export type StatusTrace = CountBarTrace | StatusHeatmapTrace;

export interface StatusFigure {
  data: StatusTrace[];
  layout: Partial<Layout>;
  config: Partial<Config>;
}

/**
 * One classified observation
 */
export interface StatusRow {
  stock: string;
  year: number;
  /** One of the scale's levels */
  category: string;
}

export interface StatusChartSpec {
  chartType: ChartKind;
  method: string;
  scale: CategoryScale;
  /** Observations with a category, in input order */
  rows: StatusRow[];
  figure: StatusFigure;
}

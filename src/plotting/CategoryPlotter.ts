/**
 * Category Plotter
 *
 * Builds Plotly figures summarizing stock status categories by year:
 * underfished (green), fully fished (yellow) or overfished (red).
 *
 * Two chart types are supported:
 * - count (legacy synonym: prop): stacked bars of observation counts per year
 * - stock (legacy synonym: all): stock-by-year raster of categories
 *
 * The first two columns of the input are read as stock and year whatever
 * their names. Ratio columns are looked up as `bbmsy.<method>` and
 * `ffmsy.<method>`.
 */

import type { Layout } from 'plotly.js';
import { resolvePlotterConfig, type PlotterConfig } from '../config';
import { fromRecords, isDataTable, toStockTimeSeries } from '../data/tables';
import type { DataRecord, DataTable } from '../data/types';
import { UnsupportedChartTypeError } from '../errors';
import { classifyStatus } from '../status/classifier';
import { categoryScale, labelFor } from '../status/scales';
import type { CategoryCount, CategoryScale, ClassifiedRow, StatusClassifier } from '../status/types';
import type {
  ChartKind,
  CountBarTrace,
  StatusChartSpec,
  StatusFigure,
  StatusHeatmapTrace,
  StatusRow
} from './types';

export const DEFAULT_METHOD = 'cmsy.naive';

// Minimal theme: white background, light grid lines, no border
const BACKGROUND_COLOR = 'white';
const GRID_COLOR = '#ebebeb';

const CHART_TYPE_ALIASES: Record<string, ChartKind> = {
  count: 'count',
  prop: 'count',
  stock: 'stock',
  all: 'stock'
};

/**
 * Resolve a chart type name, mapping legacy synonyms to their current name
 *
 * @throws UnsupportedChartTypeError for any other name
 */
export function resolveChartType(chartType: string): ChartKind {
  const kind = Object.prototype.hasOwnProperty.call(CHART_TYPE_ALIASES, chartType)
    ? CHART_TYPE_ALIASES[chartType]
    : undefined;
  if (kind === undefined) {
    throw new UnsupportedChartTypeError(chartType);
  }
  return kind;
}

/**
 * 3 selects biomass-only categories; anything else selects the 4-class
 * biomass and fishing mortality categories.
 */
export function resolveCategoryCount(numCategories: number): CategoryCount {
  if (numCategories === 3) {
    return 3;
  }
  if (numCategories !== 4) {
    console.warn(`numCategories ${numCategories} is neither 3 nor 4; using 4 categories`);
  }
  return 4;
}

function distinctSorted<T>(values: T[], compare: (a: T, b: T) => number): T[] {
  return Array.from(new Set(values)).sort(compare);
}

export class CategoryPlotter {
  private config: PlotterConfig;
  private classifier: StatusClassifier;

  /**
   * Create a CategoryPlotter instance
   *
   * @param config - Overrides for the default figure configuration
   * @param classifier - Status classifier (default: classifyStatus)
   * @throws ConfigError if the configuration is invalid
   */
  constructor(
    config: Partial<PlotterConfig> = {},
    classifier: StatusClassifier = classifyStatus
  ) {
    this.config = resolvePlotterConfig(config);
    this.classifier = classifier;
  }

  /**
   * Classify a stock time series and build a chart specification
   *
   * @param table - Time series, as a positional table or as records
   * @param method - Suffix of the ratio columns to read
   * @param numCategories - 3 or 4 status categories
   * @param chartType - "count"/"prop" or "stock"/"all"
   * @throws UnsupportedChartTypeError, MissingColumnError, InvalidTableError
   */
  render(
    table: DataTable | DataRecord[],
    method: string = DEFAULT_METHOD,
    numCategories: number = 4,
    chartType: string = 'count'
  ): StatusChartSpec {
    const scale = categoryScale(resolveCategoryCount(numCategories));
    const series = toStockTimeSeries(isDataTable(table) ? table : fromRecords(table));
    const classified = this.classifier(series, method);

    // Classification errors win over an unsupported chart type
    const kind = resolveChartType(chartType);
    const rows = this.labelRows(classified, scale);

    const figure = kind === 'count'
      ? this.buildCountFigure(rows, scale)
      : this.buildStockFigure(rows, scale);

    return { chartType: kind, method, scale, rows, figure };
  }

  /**
   * Same as render, but an unsupported chart type yields null instead of
   * an error. Other failures still throw.
   */
  tryRender(
    table: DataTable | DataRecord[],
    method: string = DEFAULT_METHOD,
    numCategories: number = 4,
    chartType: string = 'count'
  ): StatusChartSpec | null {
    try {
      return this.render(table, method, numCategories, chartType);
    } catch (error) {
      if (error instanceof UnsupportedChartTypeError) {
        console.warn(`${error.message}; no chart produced`);
        return null;
      }
      throw error;
    }
  }

  /**
   * Map codes to labels and drop observations without a category
   */
  private labelRows(classified: ClassifiedRow[], scale: CategoryScale): StatusRow[] {
    const rows: StatusRow[] = [];
    let dropped = 0;

    for (const row of classified) {
      const code = scale.count === 3 ? row.estCat3 : row.estCat4;
      const category = labelFor(scale, code);
      if (category === null) {
        dropped++;
        continue;
      }
      rows.push({ stock: row.stock, year: row.year, category });
    }

    if (dropped > 0) {
      console.warn(`Dropped ${dropped} observation(s) without a status category`);
    }
    return rows;
  }

  private baseLayout(xTitle: string, yTitle: string): Partial<Layout> {
    const layout: Partial<Layout> = {
      xaxis: {
        title: { text: xTitle },
        gridcolor: GRID_COLOR
      },
      yaxis: {
        title: { text: yTitle },
        gridcolor: GRID_COLOR
      },
      plot_bgcolor: BACKGROUND_COLOR,
      paper_bgcolor: BACKGROUND_COLOR,
      showlegend: true,
      margin: { t: 50, r: 50, b: 50, l: 50 },
      hovermode: 'closest'
    };
    if (this.config.title) {
      layout.title = { text: this.config.title };
    }
    return layout;
  }

  /**
   * Stock ids are labels even when they look like numbers ("007", "1e3")
   */
  private stockLayout(): Partial<Layout> {
    const layout = this.baseLayout('year', 'stock');
    layout.yaxis = { ...layout.yaxis, type: 'category' };
    return layout;
  }

  private figureConfig(): StatusFigure['config'] {
    return {
      responsive: this.config.responsive,
      displayModeBar: false
    };
  }

  /**
   * Stacked bars, one trace per level so every category keeps its color
   * and legend entry even when it has no observations.
   */
  private buildCountFigure(rows: StatusRow[], scale: CategoryScale): StatusFigure {
    const years = distinctSorted(rows.map(row => row.year), (a, b) => a - b);
    const yearIndex = new Map(years.map((year, i) => [year, i]));

    const counts = scale.levels.map(() => years.map(() => 0));
    for (const row of rows) {
      const level = scale.levels.indexOf(row.category);
      const column = yearIndex.get(row.year);
      if (level >= 0 && column !== undefined) {
        counts[level][column]++;
      }
    }

    const data: CountBarTrace[] = scale.levels.map((level, i) => ({
      type: 'bar',
      name: level,
      x: years,
      y: counts[i],
      width: this.config.barWidth,
      marker: {
        color: scale.colors[i],
        line: { color: scale.colors[i], width: 1 }
      },
      hovertemplate: `${level}: %{y}<extra></extra>`
    }));

    return {
      data,
      layout: { ...this.baseLayout('year', 'count'), barmode: 'stack' },
      config: this.figureConfig()
    };
  }

  /**
   * Raster of category codes with a stepwise colorscale, so each code
   * renders in exactly its level color.
   */
  private buildStockFigure(rows: StatusRow[], scale: CategoryScale): StatusFigure {
    const years = distinctSorted(rows.map(row => row.year), (a, b) => a - b);
    const stocks = distinctSorted(rows.map(row => row.stock), (a, b) => (a < b ? -1 : a > b ? 1 : 0));
    const yearIndex = new Map(years.map((year, i) => [year, i]));
    const stockIndex = new Map(stocks.map((stock, i) => [stock, i]));

    const z: (number | null)[][] = stocks.map(() => years.map(() => null));
    let duplicates = 0;
    for (const row of rows) {
      const i = stockIndex.get(row.stock);
      const j = yearIndex.get(row.year);
      if (i === undefined || j === undefined) {
        continue;
      }
      if (z[i][j] !== null) {
        duplicates++;
      }
      z[i][j] = scale.levels.indexOf(row.category) + 1;
    }
    if (duplicates > 0) {
      console.warn(`${duplicates} duplicate stock/year observation(s); keeping the last of each`);
    }

    const n = scale.levels.length;
    const colorscale: [number, string][] = scale.colors.flatMap((color, i): [number, string][] => [
      [i / n, color],
      [(i + 1) / n, color]
    ]);

    const trace: StatusHeatmapTrace = {
      type: 'heatmap',
      x: years,
      y: stocks,
      z,
      zmin: 0.5,
      zmax: n + 0.5,
      colorscale,
      showscale: true,
      colorbar: {
        tickvals: scale.levels.map((_, i) => i + 1),
        ticktext: [...scale.levels]
      },
      hovertemplate: 'stock: %{y}<br>year: %{x}<extra></extra>'
    };

    return {
      data: [trace],
      layout: this.stockLayout(),
      config: this.figureConfig()
    };
  }
}

const defaultPlotter = new CategoryPlotter();

/**
 * Plot stock status categories by year with the default configuration
 *
 * @example
 * plotCat(timeseries, 'effEdepP', 3, 'count');
 * plotCat(timeseries, 'effEdepP', 3, 'stock');
 */
export function plotCat(
  table: DataTable | DataRecord[],
  method: string = DEFAULT_METHOD,
  cats: number = 4,
  type: string = 'count'
): StatusChartSpec {
  return defaultPlotter.render(table, method, cats, type);
}

/**
 * Older name for plotCat, kept for existing scripts.
 *
 * @deprecated Use plotCat.
 */
export function plotProp(...args: Parameters<typeof plotCat>): StatusChartSpec {
  return plotCat(...args);
}

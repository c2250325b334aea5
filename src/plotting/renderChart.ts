/**
 * Browser Rendering
 *
 * Draws a chart specification with Plotly. Plotly is loaded on first use
 * because it needs a DOM; everything else in this package runs without one.
 */

import type { StatusChartSpec } from './types';

/**
 * Render a chart specification into a DOM element
 *
 * @param element - DOM element or its ID
 * @param spec - Specification from CategoryPlotter.render or plotCat
 */
export async function renderChart(element: string | HTMLElement, spec: StatusChartSpec): Promise<void> {
  const { default: Plotly } = await import('plotly.js-dist-min');
  await Plotly.newPlot(element, spec.figure.data, spec.figure.layout, spec.figure.config);
}

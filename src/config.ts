/**
 * Plotter Configuration
 *
 * Defaults for the chart figures produced by CategoryPlotter, with
 * optional overrides from code or from the environment:
 * - STOCK_STATUS_BAR_WIDTH: bar width of the count chart, in (0, 1]
 * - STOCK_STATUS_RESPONSIVE: "true" or "false"
 * - STOCK_STATUS_TITLE: figure title
 */

import { z } from 'zod';
import { ConfigError } from './errors';

export const PlotterConfigSchema = z.object({
  barWidth: z.number().gt(0).lte(1),
  responsive: z.boolean(),
  title: z.string().min(1).optional()
});

export type PlotterConfig = z.infer<typeof PlotterConfigSchema>;

export const DEFAULT_PLOTTER_CONFIG: PlotterConfig = {
  barWidth: 0.5,
  responsive: true
};

const EnvSchema = z.object({
  STOCK_STATUS_BAR_WIDTH: z
    .string()
    .regex(/^\d*\.?\d+$/, 'must be a number')
    .transform(Number)
    .optional(),
  STOCK_STATUS_RESPONSIVE: z
    .enum(['true', 'false'])
    .transform((value) => value === 'true')
    .optional(),
  STOCK_STATUS_TITLE: z.string().optional()
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Merge overrides onto the defaults and validate the result
 *
 * @throws ConfigError if a value is out of range
 */
export function resolvePlotterConfig(overrides: Partial<PlotterConfig> = {}): PlotterConfig {
  const result = PlotterConfigSchema.safeParse({ ...DEFAULT_PLOTTER_CONFIG, ...overrides });
  if (!result.success) {
    throw new ConfigError(`Invalid plotter configuration: ${describeIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Build a configuration from environment variables
 *
 * Unset variables keep their defaults.
 */
export function loadPlotterConfig(env: NodeJS.ProcessEnv = process.env): PlotterConfig {
  const result = EnvSchema.safeParse({
    STOCK_STATUS_BAR_WIDTH: env.STOCK_STATUS_BAR_WIDTH,
    STOCK_STATUS_RESPONSIVE: env.STOCK_STATUS_RESPONSIVE,
    STOCK_STATUS_TITLE: env.STOCK_STATUS_TITLE
  });
  if (!result.success) {
    throw new ConfigError(`Invalid environment: ${describeIssues(result.error)}`);
  }

  const overrides: Partial<PlotterConfig> = {};
  if (result.data.STOCK_STATUS_BAR_WIDTH !== undefined) {
    overrides.barWidth = result.data.STOCK_STATUS_BAR_WIDTH;
  }
  if (result.data.STOCK_STATUS_RESPONSIVE !== undefined) {
    overrides.responsive = result.data.STOCK_STATUS_RESPONSIVE;
  }
  if (result.data.STOCK_STATUS_TITLE) {
    overrides.title = result.data.STOCK_STATUS_TITLE;
  }
  return resolvePlotterConfig(overrides);
}

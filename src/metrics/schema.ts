import { z } from 'zod';
import { parseInput } from '../validation.js';

export const metricsConfigSchema = z.object({
  /** Annual risk-free rate (0.02 = 2%) */
  riskFreeRate: z.number().finite().default(0.02),

  /** Return observations per year (252 trading days) */
  periodsPerYear: z.number().int().positive().default(252),
});

export type MetricsConfigInput = z.input<typeof metricsConfigSchema>;

export type MetricsConfig = Readonly<z.output<typeof metricsConfigSchema>>;

export function parseMetricsConfig(input: unknown = {}): MetricsConfig {
  return Object.freeze(parseInput(metricsConfigSchema, input, 'metrics'));
}

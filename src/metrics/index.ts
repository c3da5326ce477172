export {
  MetricsCalculator,
  periodicReturns,
  totalReturn,
  annualizedVolatility,
  sharpeRatio,
  maxDrawdown,
  tradeStats,
  roundTo,
} from './MetricsCalculator.js';
export { formatReport, formatTrade, formatOpenTrade } from './formatter.js';
export { parseMetricsConfig, metricsConfigSchema } from './schema.js';
export type { MetricsConfig, MetricsConfigInput } from './schema.js';
export type { PerformanceReport, RawMetrics, TradeStats } from './types.js';

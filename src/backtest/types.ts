/**
 * Types for Backtester
 */

import type { MetricsConfigInput } from '../metrics/schema.js';
import type { PerformanceReport } from '../metrics/types.js';
import type { SimulationConfigInput } from '../simulation/schema.js';
import type { EquityCurve, OpenTrade, Trade, TradeExecution } from '../simulation/types.js';
import type { StrategyConfig, StrategyConfigInput } from '../strategy/schema.js';
import type { SignalFrame } from '../strategy/types.js';

export interface BacktestOptions {
  /** Raw input or an already parsed config; validated either way */
  strategy?: StrategyConfigInput | StrategyConfig;
  simulation?: SimulationConfigInput;
  metrics?: MetricsConfigInput;
}

export interface BacktestResult {
  /** Price bars with indicators and signals, for charting */
  signals: SignalFrame;
  equityCurve: EquityCurve;
  trades: readonly Trade[];
  openTrade: OpenTrade | null;
  executions: readonly TradeExecution[];
  report: PerformanceReport;
}

export type BacktesterEvents = {
  completed: [result: BacktestResult];
};

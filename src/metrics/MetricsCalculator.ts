/**
 * Metrics Calculator
 *
 * Aggregates an equity curve and the closed trades into a performance report.
 * Everything is computed at full precision; rounding happens only in `calculate`.
 */

import { InvalidInputError } from '../errors.js';
import type { EquityCurve, Trade } from '../simulation/types.js';
import { parseMetricsConfig } from './schema.js';
import type { MetricsConfig, MetricsConfigInput } from './schema.js';
import type { PerformanceReport, RawMetrics, TradeStats } from './types.js';

const PERCENT_DECIMALS = 2;
const CURRENCY_DECIMALS = 2;
const RATIO_DECIMALS = 3;

function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Sample standard deviation (n - 1); 0 below two observations
 */
function sampleStd(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const squared = values.reduce((sum, value) => sum + (value - avg) ** 2, 0);
  return Math.sqrt(squared / (values.length - 1));
}

/**
 * Round half up to `decimals` places. Infinity passes through and -0 becomes 0.
 */
export function roundTo(value: number, decimals: number): number {
  if (!Number.isFinite(value)) return value;
  const factor = 10 ** decimals;
  const rounded = Math.round(value * factor) / factor;
  return rounded === 0 ? 0 : rounded;
}

/**
 * `r[t] = v[t] / v[t-1] - 1` for t > 0; one element shorter than the input
 */
export function periodicReturns(values: readonly number[]): number[] {
  const returns: number[] = [];
  for (let t = 1; t < values.length; t++) {
    returns.push(values[t] / values[t - 1] - 1);
  }
  return returns;
}

export function totalReturn(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values[values.length - 1] / values[0] - 1;
}

export function annualizedVolatility(returns: readonly number[], periodsPerYear: number): number {
  if (returns.length < 2) return 0;
  return sampleStd(returns) * Math.sqrt(periodsPerYear);
}

export function sharpeRatio(
  returns: readonly number[],
  riskFreeRate: number,
  periodsPerYear: number
): number {
  const std = sampleStd(returns);
  if (std === 0) return 0;

  const periodRiskFree = riskFreeRate / periodsPerYear;
  const excess = returns.map((r) => r - periodRiskFree);
  return (Math.sqrt(periodsPerYear) * mean(excess)) / std;
}

/**
 * Largest decline from a running peak, as a fraction (zero or negative)
 */
export function maxDrawdown(values: readonly number[]): number {
  let peak = -Infinity;
  let worst = 0;
  for (const value of values) {
    peak = Math.max(peak, value);
    const drawdown = (value - peak) / peak;
    if (drawdown < worst) {
      worst = drawdown;
    }
  }
  return worst;
}

/**
 * Win/loss accounting over closed trades. A zero P&L counts as a loss.
 */
export function tradeStats(trades: readonly Trade[]): TradeStats {
  const wins = trades.filter((trade) => trade.realizedPnl > 0).length;
  const losses = trades.length - wins;

  let winLossRatio = 0;
  if (losses > 0) {
    winLossRatio = wins / losses;
  } else if (wins > 0) {
    winLossRatio = Infinity;
  }

  return {
    wins,
    losses,
    winRate: trades.length > 0 ? wins / trades.length : 0,
    winLossRatio,
    avgTradePnl: mean(trades.map((trade) => trade.realizedPnl)),
  };
}

export class MetricsCalculator {
  private readonly config: MetricsConfig;

  constructor(config: MetricsConfigInput = {}) {
    this.config = parseMetricsConfig(config);
  }

  /**
   * Unrounded metrics. Throws InvalidInputError on an empty equity curve.
   */
  calculateRaw(equityCurve: EquityCurve, trades: readonly Trade[]): RawMetrics {
    if (equityCurve.length === 0) {
      throw new InvalidInputError('equityCurve', 'equity curve is empty');
    }

    const { riskFreeRate, periodsPerYear } = this.config;
    const values = equityCurve.map((point) => point.portfolioValue);
    const returns = periodicReturns(values);
    const stats = tradeStats(trades);

    return {
      totalReturn: totalReturn(values),
      sharpeRatio: sharpeRatio(returns, riskFreeRate, periodsPerYear),
      maxDrawdown: maxDrawdown(values),
      volatility: annualizedVolatility(returns, periodsPerYear),
      winRate: stats.winRate,
      winLossRatio: stats.winLossRatio,
      totalTrades: trades.length,
      avgTradePnl: stats.avgTradePnl,
      finalPortfolioValue: values[values.length - 1],
    };
  }

  /**
   * Rounded performance report
   */
  calculate(equityCurve: EquityCurve, trades: readonly Trade[]): PerformanceReport {
    const raw = this.calculateRaw(equityCurve, trades);

    return {
      totalReturnPct: roundTo(raw.totalReturn * 100, PERCENT_DECIMALS),
      sharpeRatio: roundTo(raw.sharpeRatio, RATIO_DECIMALS),
      maxDrawdownPct: roundTo(raw.maxDrawdown * 100, PERCENT_DECIMALS),
      volatilityPct: roundTo(raw.volatility * 100, PERCENT_DECIMALS),
      winRatePct: roundTo(raw.winRate * 100, PERCENT_DECIMALS),
      winLossRatio: roundTo(raw.winLossRatio, RATIO_DECIMALS),
      totalTrades: raw.totalTrades,
      avgTradePnl: roundTo(raw.avgTradePnl, CURRENCY_DECIMALS),
      finalPortfolioValue: roundTo(raw.finalPortfolioValue, CURRENCY_DECIMALS),
    };
  }

  getConfig(): MetricsConfig {
    return this.config;
  }
}

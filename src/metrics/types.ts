/**
 * Types for Metrics Calculator
 */

/**
 * Unrounded metric values, fractions rather than percentages
 */
export interface RawMetrics {
  totalReturn: number;
  sharpeRatio: number;
  maxDrawdown: number;
  volatility: number;
  winRate: number;
  winLossRatio: number;
  totalTrades: number;
  avgTradePnl: number;
  finalPortfolioValue: number;
}

/**
 * Rounded report: 2 decimals for percentages and currency, 3 for ratios
 */
export interface PerformanceReport {
  totalReturnPct: number;
  sharpeRatio: number;
  /** Zero or negative */
  maxDrawdownPct: number;
  volatilityPct: number;
  winRatePct: number;
  /** `Infinity` when every closed trade won */
  winLossRatio: number;
  totalTrades: number;
  avgTradePnl: number;
  finalPortfolioValue: number;
}

export interface TradeStats {
  wins: number;
  losses: number;
  winRate: number;
  winLossRatio: number;
  avgTradePnl: number;
}

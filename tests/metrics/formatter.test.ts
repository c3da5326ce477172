/**
 * Tests for Report Formatter
 */

import { describe, it, expect } from 'vitest';
import { formatOpenTrade, formatReport, formatTrade } from '../../src/metrics/formatter.js';
import type { PerformanceReport } from '../../src/metrics/types.js';
import type { Trade } from '../../src/simulation/types.js';

const report: PerformanceReport = {
  totalReturnPct: 9.65,
  sharpeRatio: 1.234,
  maxDrawdownPct: -5.9,
  volatilityPct: 18.5,
  winRatePct: 100,
  winLossRatio: Infinity,
  totalTrades: 1,
  avgTradePnl: 965.06,
  finalPortfolioValue: 10965.06,
};

const trade: Trade = {
  entryTimestamp: Date.UTC(2024, 0, 15),
  entryPrice: 172,
  exitTimestamp: Date.UTC(2024, 1, 1),
  exitPrice: 189,
  shares: 58,
  commissionPaid: 20.93,
  realizedPnl: 965.062,
};

describe('formatReport', () => {
  it('should align labels and format values', () => {
    expect(formatReport(report).split('\n')).toEqual([
      'Total Return   : 9.65%',
      'Sharpe Ratio   : 1.234',
      'Max Drawdown   : -5.90%',
      'Volatility     : 18.50%',
      'Win Rate       : 100.00%',
      'Win/Loss Ratio : ∞',
      'Total Trades   : 1',
      'Avg Trade P&L  : $965.06',
      'Final Value    : $10,965.06',
    ]);
  });

  it('should print a finite win/loss ratio with 3 decimals', () => {
    const line = formatReport({ ...report, winLossRatio: 1.5 }).split('\n')[5];
    expect(line).toBe('Win/Loss Ratio : 1.500');
  });
});

describe('formatTrade', () => {
  it('should describe a winning round trip', () => {
    expect(formatTrade(trade)).toBe(
      '2024-01-15 BUY 58 @ $172.00 -> 2024-02-01 SELL @ $189.00 | P&L +$965.06'
    );
  });

  it('should sign a losing round trip', () => {
    expect(formatTrade({ ...trade, realizedPnl: -12.5 })).toBe(
      '2024-01-15 BUY 58 @ $172.00 -> 2024-02-01 SELL @ $189.00 | P&L -$12.50'
    );
  });
});

describe('formatOpenTrade', () => {
  it('should mark the position as open', () => {
    expect(
      formatOpenTrade({
        entryTimestamp: Date.UTC(2024, 0, 15),
        entryPrice: 1234.5,
        shares: 8,
        entryCost: 9885.876,
        entryCommission: 9.876,
      })
    ).toBe('2024-01-15 BUY 8 @ $1,234.50 (open)');
  });
});

/**
 * Tests for Backtester
 */

import { describe, it, expect, vi } from 'vitest';
import { Backtester, runBacktest } from '../../src/backtest/Backtester.js';
import { InvalidInputError } from '../../src/errors.js';
import { ramp, seriesFromCloses, troughPeakCloses } from '../helpers/series.js';

describe('Backtester', () => {
  describe('flat market', () => {
    it('should trade nothing and report zeros', () => {
      const result = new Backtester().run(
        seriesFromCloses(Array.from({ length: 60 }, () => 100))
      );

      expect(result.trades).toEqual([]);
      expect(result.openTrade).toBeNull();
      expect(result.equityCurve).toHaveLength(60);
      expect(result.report).toEqual({
        totalReturnPct: 0,
        sharpeRatio: 0,
        maxDrawdownPct: 0,
        volatilityPct: 0,
        winRatePct: 0,
        winLossRatio: 0,
        totalTrades: 0,
        avgTradePnl: 0,
        finalPortfolioValue: 10000,
      });
    });
  });

  describe('trough then peak', () => {
    const options = { strategy: { indicators: ['RSI' as const] } };

    it('should close one profitable round trip', () => {
      const result = new Backtester(options).run(seriesFromCloses(troughPeakCloses()));

      // 58 shares: cost 58 * 172 * 1.001, proceeds 58 * 189 * 0.999
      expect(result.trades).toHaveLength(1);
      expect(result.trades[0].shares).toBe(58);
      expect(result.trades[0].entryPrice).toBe(172);
      expect(result.trades[0].exitPrice).toBe(189);
      expect(result.trades[0].realizedPnl).toBeCloseTo(965.062, 8);
      expect(result.openTrade).toBeNull();
    });

    it('should report the run', () => {
      const { report } = new Backtester(options).run(seriesFromCloses(troughPeakCloses()));

      expect(report.totalReturnPct).toBe(9.65);
      expect(report.winRatePct).toBe(100);
      expect(report.winLossRatio).toBe(Infinity);
      expect(report.totalTrades).toBe(1);
      expect(report.avgTradePnl).toBe(965.06);
      expect(report.finalPortfolioValue).toBe(10965.06);
      // 10000 before the buy, 9410.024 at the trough
      expect(report.maxDrawdownPct).toBe(-5.9);
    });

    it('should conserve cash across the run', () => {
      const result = new Backtester(options).run(seriesFromCloses(troughPeakCloses()));
      const totalPnl = result.trades.reduce((sum, trade) => sum + trade.realizedPnl, 0);
      const last = result.equityCurve[result.equityCurve.length - 1];

      expect(last.cash).toBeCloseTo(10000 + totalPnl, 8);
      for (const point of result.equityCurve) {
        expect(point.cash).toBeGreaterThanOrEqual(0);
      }
    });

    it('should be deterministic', () => {
      const series = seriesFromCloses(troughPeakCloses());

      expect(new Backtester(options).run(series)).toEqual(new Backtester(options).run(series));
    });

    it('should match runBacktest', () => {
      const series = seriesFromCloses(troughPeakCloses());

      expect(runBacktest(series, options)).toEqual(new Backtester(options).run(series));
    });
  });

  describe('combine logic', () => {
    const series = seriesFromCloses(ramp(200, -2, 30));

    it('should stay out under AND while MACD is warming up', () => {
      const result = new Backtester({
        strategy: { indicators: ['RSI', 'MACD'], combineLogic: 'AND' },
      }).run(series);

      expect(result.executions).toEqual([]);
      expect(result.report.finalPortfolioValue).toBe(10000);
    });

    it('should enter under OR on RSI alone', () => {
      const result = new Backtester({
        strategy: { indicators: ['RSI', 'MACD'], combineLogic: 'OR' },
      }).run(series);

      expect(result.executions).toHaveLength(1);
      expect(result.executions[0]).toMatchObject({ side: 'BUY', price: 172, shares: 58 });
    });
  });

  describe('position left open', () => {
    it('should return the open trade and value it at the last close', () => {
      const result = new Backtester({ strategy: { indicators: ['RSI'] } }).run(
        seriesFromCloses(ramp(200, -2, 20))
      );

      expect(result.trades).toEqual([]);
      expect(result.openTrade).toMatchObject({ entryPrice: 172, shares: 58 });
      // 14.024 cash + 58 * 162
      expect(result.report.finalPortfolioValue).toBe(9410.02);
      expect(result.report.totalReturnPct).toBe(-5.9);
      expect(result.report.totalTrades).toBe(0);
    });
  });

  describe('insufficient cash', () => {
    it('should keep the signal but never fill it', () => {
      const result = new Backtester({
        strategy: { indicators: ['RSI'] },
        simulation: { initialCapital: 50 },
      }).run(seriesFromCloses(troughPeakCloses()));

      expect(result.signals[14].buySignal).toBe(true);
      expect(result.executions).toEqual([]);
      expect(result.report.finalPortfolioValue).toBe(50);
      expect(result.report.totalReturnPct).toBe(0);
    });
  });

  describe('validation', () => {
    it('should reject an invalid strategy before running', () => {
      let caught: unknown;
      try {
        new Backtester({ strategy: { rsiOversold: 80, rsiOverbought: 70 } });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(InvalidInputError);
      expect(caught instanceof InvalidInputError && caught.field).toBe('strategy.rsiOverbought');
    });

    it('should reject a non-monotonic series without simulating', () => {
      const backtester = new Backtester();
      const simulate = vi.spyOn(backtester.getSimulationEngine(), 'run');
      const series = seriesFromCloses([100, 101, 102]);
      const unordered = [series[1], series[0], series[2]];

      expect(() => backtester.run(unordered)).toThrow(InvalidInputError);
      expect(simulate).not.toHaveBeenCalled();
    });
  });

  describe('events', () => {
    it('should emit completed with the result', () => {
      const backtester = new Backtester();
      const completed = vi.fn();
      backtester.on('completed', completed);

      const result = backtester.run(seriesFromCloses(ramp(100, 1, 40)));

      expect(completed).toHaveBeenCalledTimes(1);
      expect(completed).toHaveBeenCalledWith(result);
    });
  });
});

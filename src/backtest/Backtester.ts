/**
 * Backtester
 *
 * Runs the pipeline in one pass:
 * Price Series → Signal Generator → Simulation Engine → Metrics Calculator
 *
 * Each instance holds only immutable configuration, so independent runs
 * (parameter sweeps) need no coordination.
 */

import { EventEmitter } from 'eventemitter3';
import { logger } from '../logger.js';
import { MetricsCalculator } from '../metrics/index.js';
import { SimulationEngine } from '../simulation/index.js';
import { parseStrategyConfig, SignalGenerator } from '../strategy/index.js';
import type { PriceSeries } from '../types.js';
import type { BacktestOptions, BacktestResult, BacktesterEvents } from './types.js';

export class Backtester extends EventEmitter<BacktesterEvents> {
  private readonly signalGenerator: SignalGenerator;
  private readonly simulationEngine: SimulationEngine;
  private readonly metricsCalculator: MetricsCalculator;

  /**
   * Throws InvalidInputError if any of the three configurations is invalid
   */
  constructor(options: BacktestOptions = {}) {
    super();

    this.signalGenerator = new SignalGenerator(parseStrategyConfig(options.strategy ?? {}));
    this.simulationEngine = new SimulationEngine(options.simulation ?? {});
    this.metricsCalculator = new MetricsCalculator(options.metrics ?? {});

    this.setupEventLogging();
  }

  /**
   * Log engine events as the run progresses
   */
  private setupEventLogging(): void {
    this.signalGenerator.on('insufficientData', (available, required) => {
      logger.info('Series shorter than indicator warm-up', { available, required });
    });

    this.simulationEngine.on('tradeClosed', (trade) => {
      logger.info('Trade closed', {
        entryPrice: trade.entryPrice,
        exitPrice: trade.exitPrice,
        shares: trade.shares,
        realizedPnl: trade.realizedPnl.toFixed(2),
      });
    });

    this.simulationEngine.on('buySkipped', (event) => {
      logger.warn('Buy signal not executed', { timestamp: event.timestamp, reason: event.reason });
    });
  }

  /**
   * Run a full backtest. Throws InvalidInputError on a malformed series; nothing is
   * returned in that case.
   */
  run(series: PriceSeries): BacktestResult {
    const signals = this.signalGenerator.generate(series);
    const simulation = this.simulationEngine.run(signals);
    const report = this.metricsCalculator.calculate(simulation.equityCurve, simulation.trades);

    const result: BacktestResult = {
      signals,
      equityCurve: simulation.equityCurve,
      trades: simulation.trades,
      openTrade: simulation.openTrade,
      executions: simulation.executions,
      report,
    };

    logger.info('Backtest complete', {
      bars: series.length,
      trades: report.totalTrades,
      openPosition: result.openTrade !== null,
      totalReturnPct: report.totalReturnPct,
    });

    this.emit('completed', result);
    return result;
  }

  getSignalGenerator(): SignalGenerator {
    return this.signalGenerator;
  }

  getSimulationEngine(): SimulationEngine {
    return this.simulationEngine;
  }
}

/**
 * One-off backtest without keeping the Backtester around
 */
export function runBacktest(series: PriceSeries, options: BacktestOptions = {}): BacktestResult {
  return new Backtester(options).run(series);
}

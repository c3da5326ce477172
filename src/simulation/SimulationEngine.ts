/**
 * Simulation Engine
 *
 * Single forward pass over signal bars. For each bar:
 * 1. Mark holdings at the close into an equity point
 * 2. FLAT + buy signal: buy every affordable whole share
 * 3. LONG + sell signal: sell the whole position
 *
 * Signals that do not match the current state are ignored. A position still open
 * after the last bar stays open and is reported as `openTrade`.
 */

import { EventEmitter } from 'eventemitter3';
import { logger } from '../logger.js';
import { assertValidPriceSeries } from '../validation.js';
import { Ledger } from './Ledger.js';
import { parseSimulationConfig } from './schema.js';
import type { SimulationConfig, SimulationConfigInput } from './schema.js';
import type {
  EquityPoint,
  SimulationBar,
  SimulationEngineEvents,
  SimulationResult,
} from './types.js';

export class SimulationEngine extends EventEmitter<SimulationEngineEvents> {
  private readonly config: SimulationConfig;

  constructor(config: SimulationConfigInput = {}) {
    super();
    this.config = parseSimulationConfig(config);

    logger.debug('Simulation Engine initialized', {
      initialCapital: this.config.initialCapital,
      commissionRate: this.config.commissionRate,
    });
  }

  /**
   * Run the simulation. Throws InvalidInputError before touching any bar if the
   * series is malformed.
   */
  public run(bars: readonly SimulationBar[]): SimulationResult {
    assertValidPriceSeries(bars);

    const ledger = new Ledger(this.config.initialCapital, this.config.commissionRate);
    const equityCurve: EquityPoint[] = [];

    for (const bar of bars) {
      const price = bar.close;

      // 1. Mark to market before any fill on this bar
      equityCurve.push(ledger.mark(bar.timestamp, price));

      // 2. Entry
      if (bar.buySignal && ledger.getState() === 'FLAT') {
        const opened = ledger.buy(bar.timestamp, price);
        if (opened) {
          logger.debug('Position opened', {
            timestamp: bar.timestamp,
            price,
            shares: opened.shares,
            cost: opened.entryCost.toFixed(2),
          });
          this.emit('tradeOpened', opened);
        } else {
          const cash = ledger.getCash();
          const reason = `Cash ${cash.toFixed(2)} cannot buy one share at ${price}`;
          logger.debug('Buy signal skipped', { timestamp: bar.timestamp, reason });
          this.emit('buySkipped', { timestamp: bar.timestamp, price, cash, reason });
        }
      }
      // 3. Exit
      else if (bar.sellSignal && ledger.getState() === 'LONG') {
        const closed = ledger.sell(bar.timestamp, price);
        if (closed) {
          logger.debug('Position closed', {
            timestamp: bar.timestamp,
            price,
            shares: closed.shares,
            realizedPnl: closed.realizedPnl.toFixed(2),
          });
          this.emit('tradeClosed', closed);
        }
      }
    }

    const openTrade = ledger.getOpenTrade();
    const trades = ledger.getClosedTrades();

    logger.debug('Simulation complete', {
      bars: bars.length,
      closedTrades: trades.length,
      openPosition: openTrade !== null,
      finalCash: ledger.getCash().toFixed(2),
    });

    return {
      equityCurve,
      trades: [...trades],
      openTrade: openTrade ? { ...openTrade } : null,
      executions: [...ledger.getExecutions()],
    };
  }

  public getConfig(): SimulationConfig {
    return this.config;
  }
}

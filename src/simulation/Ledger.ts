/**
 * Ledger
 *
 * Cash, shares and the open trade for one simulation run. Only the
 * SimulationEngine that created it mutates it.
 *
 * Sizing:
 * 1. unitCost = price * (1 + commissionRate)
 * 2. shares = floor(cash / unitCost), lowered by one if rounding would overdraw cash
 * 3. cost = shares * price * (1 + commissionRate)
 */

import type { PositionState } from '../types.js';
import type { EquityPoint, OpenTrade, Trade, TradeExecution } from './types.js';

export class Ledger {
  private readonly commissionRate: number;
  private cash: number;
  private openTrade: OpenTrade | null = null;
  private readonly closedTrades: Trade[] = [];
  private readonly executions: TradeExecution[] = [];

  constructor(initialCash: number, commissionRate: number) {
    this.cash = initialCash;
    this.commissionRate = commissionRate;
  }

  getCash(): number {
    return this.cash;
  }

  getSharesHeld(): number {
    return this.openTrade?.shares ?? 0;
  }

  getState(): PositionState {
    return this.openTrade ? 'LONG' : 'FLAT';
  }

  getOpenTrade(): OpenTrade | null {
    return this.openTrade;
  }

  getClosedTrades(): readonly Trade[] {
    return this.closedTrades;
  }

  getExecutions(): readonly TradeExecution[] {
    return this.executions;
  }

  /**
   * Value holdings at `price`
   */
  mark(timestamp: number, price: number): EquityPoint {
    const sharesHeld = this.getSharesHeld();
    return {
      timestamp,
      cash: this.cash,
      sharesHeld,
      markPrice: price,
      portfolioValue: this.cash + sharesHeld * price,
    };
  }

  /**
   * Whole shares the current cash buys at `price`, commission included
   */
  affordableShares(price: number): number {
    const unitCost = price * (1 + this.commissionRate);
    let shares = Math.floor(this.cash / unitCost);
    if (shares > 0 && shares * price * (1 + this.commissionRate) > this.cash) {
      shares -= 1;
    }
    return Math.max(shares, 0);
  }

  /**
   * Open a position with all affordable shares.
   *
   * @returns the open trade, or null when already LONG or not even one share is affordable
   */
  buy(timestamp: number, price: number): OpenTrade | null {
    if (this.openTrade) {
      return null;
    }

    const shares = this.affordableShares(price);
    if (shares < 1) {
      return null;
    }

    const entryCost = shares * price * (1 + this.commissionRate);
    const entryCommission = shares * price * this.commissionRate;
    this.cash -= entryCost;

    this.openTrade = {
      entryTimestamp: timestamp,
      entryPrice: price,
      shares,
      entryCost,
      entryCommission,
    };
    this.executions.push({
      timestamp,
      side: 'BUY',
      price,
      shares,
      value: entryCost,
      commission: entryCommission,
      cashAfter: this.cash,
    });

    return this.openTrade;
  }

  /**
   * Close the open position at `price`.
   *
   * @returns the closed trade, or null when FLAT
   */
  sell(timestamp: number, price: number): Trade | null {
    const open = this.openTrade;
    if (!open) {
      return null;
    }

    const proceeds = open.shares * price * (1 - this.commissionRate);
    const exitCommission = open.shares * price * this.commissionRate;
    this.cash += proceeds;
    this.openTrade = null;

    const trade: Trade = {
      entryTimestamp: open.entryTimestamp,
      entryPrice: open.entryPrice,
      exitTimestamp: timestamp,
      exitPrice: price,
      shares: open.shares,
      commissionPaid: open.entryCommission + exitCommission,
      realizedPnl: proceeds - open.entryCost,
    };
    this.closedTrades.push(trade);
    this.executions.push({
      timestamp,
      side: 'SELL',
      price,
      shares: open.shares,
      value: proceeds,
      commission: exitCommission,
      cashAfter: this.cash,
    });

    return trade;
  }
}

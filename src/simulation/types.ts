/**
 * Types for Simulation Engine
 */

import type { PriceBar, SignalType } from '../types.js';

// ===========================================
// Input Types
// ===========================================

/**
 * The part of a signal bar the simulation reads
 */
export interface SimulationBar extends PriceBar {
  buySignal: boolean;
  sellSignal: boolean;
}

// ===========================================
// Ledger Types
// ===========================================

/**
 * Position held between a buy and its sell
 */
export interface OpenTrade {
  entryTimestamp: number;
  entryPrice: number;
  shares: number;
  /** Cash debited, entry commission included */
  entryCost: number;
  entryCommission: number;
}

/**
 * Completed round trip
 */
export interface Trade {
  entryTimestamp: number;
  entryPrice: number;
  exitTimestamp: number;
  exitPrice: number;
  shares: number;
  /** Entry plus exit commission */
  commissionPaid: number;
  /** Exit proceeds minus entry cost, both net of commission */
  realizedPnl: number;
}

/**
 * A single fill, BUY or SELL
 */
export interface TradeExecution {
  timestamp: number;
  side: SignalType;
  price: number;
  shares: number;
  /** Cash debited (BUY) or credited (SELL) */
  value: number;
  commission: number;
  cashAfter: number;
}

export interface EquityPoint {
  timestamp: number;
  cash: number;
  sharesHeld: number;
  markPrice: number;
  portfolioValue: number;
}

export type EquityCurve = readonly EquityPoint[];

// ===========================================
// Result Types
// ===========================================

export interface SimulationResult {
  equityCurve: EquityCurve;
  /** Closed round trips only */
  trades: readonly Trade[];
  /** Position still held after the last bar; never force-closed */
  openTrade: OpenTrade | null;
  executions: readonly TradeExecution[];
}

// ===========================================
// Event Types
// ===========================================

export interface BuySkippedEvent {
  timestamp: number;
  price: number;
  cash: number;
  reason: string;
}

export type SimulationEngineEvents = {
  tradeOpened: [trade: OpenTrade];
  tradeClosed: [trade: Trade];
  buySkipped: [event: BuySkippedEvent];
};

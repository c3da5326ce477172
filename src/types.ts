/**
 * Common types for the signal backtest engine
 */

// ===========================================
// Market Data Types
// ===========================================

/**
 * One OHLCV bar. `timestamp` is epoch milliseconds and is the bar's unique key.
 */
export interface PriceBar {
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * Bars ordered by strictly increasing timestamp
 */
export type PriceSeries = readonly PriceBar[];

// ===========================================
// Position Types
// ===========================================

export type PositionState = 'FLAT' | 'LONG';

export type SignalType = 'BUY' | 'SELL';

// ===========================================
// Validation Types
// ===========================================

export interface ValidationIssue {
  field: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  issues: ValidationIssue[];
}

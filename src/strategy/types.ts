/**
 * Types for Strategy (indicators + signal generation)
 */

import type { PositionState, PriceBar, SignalType } from '../types.js';

export type IndicatorToggle = 'RSI' | 'MACD' | 'MA';

export type CombineLogic = 'AND' | 'OR';

/**
 * One value per input position; `null` until the warm-up window is complete
 */
export type IndicatorSeries = (number | null)[];

export interface MacdResult {
  macd: IndicatorSeries;
  signal: IndicatorSeries;
  histogram: IndicatorSeries;
}

export interface BollingerResult {
  upper: IndicatorSeries;
  middle: IndicatorSeries;
  lower: IndicatorSeries;
}

/**
 * Indicator values attached to a single bar
 */
export interface IndicatorValues {
  rsi: number | null;
  macd: number | null;
  macdSignal: number | null;
  macdHistogram: number | null;
  smaFast: number | null;
  smaSlow: number | null;
  bbUpper: number | null;
  bbMid: number | null;
  bbLower: number | null;
}

export interface IndicatorBar extends PriceBar, IndicatorValues {}

export type IndicatorFrame = readonly IndicatorBar[];

export interface SignalBar extends IndicatorBar {
  buySignal: boolean;
  sellSignal: boolean;
  /** State after this bar's transition */
  positionState: PositionState;
}

export type SignalFrame = readonly SignalBar[];

/**
 * Per-indicator sub-condition outcome at one bar
 */
export type ConditionSet = Record<IndicatorToggle, boolean>;

export interface ConditionEvaluation {
  buy: ConditionSet;
  sell: ConditionSet;
}

export interface SignalDetectedEvent {
  type: SignalType;
  index: number;
  timestamp: number;
  close: number;
  /** Enabled indicators whose sub-condition held */
  triggers: IndicatorToggle[];
}

export type SignalGeneratorEvents = {
  signalDetected: [event: SignalDetectedEvent];
  insufficientData: [available: number, required: number];
};

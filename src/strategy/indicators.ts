/**
 * Technical Indicators
 *
 * Pure functions over a close-price sequence. Every result has the same length as its
 * input, with `null` in the warm-up positions. SMA and Bollinger Bands come from the
 * technicalindicators library; RSI and the EMA behind MACD are computed here because
 * they need simple-average RSI and first-value EMA seeding.
 */

import { BollingerBands, SMA } from 'technicalindicators';
import { InvalidInputError } from '../errors.js';
import type { PriceSeries } from '../types.js';
import type { StrategyConfig } from './schema.js';
import type {
  BollingerResult,
  IndicatorFrame,
  IndicatorSeries,
  MacdResult,
} from './types.js';

function assertWindow(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidInputError(name, `must be a positive integer, got ${value}`);
  }
}

/**
 * Left-pad a library result (which omits warm-up positions) back to input length
 */
function alignToInput(values: readonly number[], length: number): IndicatorSeries {
  if (values.length >= length) {
    return values.slice(values.length - length);
  }
  return [...new Array<null>(length - values.length).fill(null), ...values];
}

/**
 * Relative Strength Index from simple averages of gains and losses.
 *
 * Defined from index `period`, where `period` deltas are available.
 * Zero average loss gives 100; a window with neither gains nor losses gives 50.
 */
export function rsi(close: readonly number[], period: number = 14): IndicatorSeries {
  assertWindow('rsiPeriod', period);

  const result: IndicatorSeries = new Array<number | null>(close.length).fill(null);

  for (let t = period; t < close.length; t++) {
    let gains = 0;
    let losses = 0;
    for (let j = t - period + 1; j <= t; j++) {
      const delta = close[j] - close[j - 1];
      if (delta > 0) {
        gains += delta;
      } else {
        losses -= delta;
      }
    }

    const avgGain = gains / period;
    const avgLoss = losses / period;

    if (avgLoss === 0) {
      result[t] = avgGain === 0 ? 50 : 100;
    } else {
      result[t] = 100 - 100 / (1 + avgGain / avgLoss);
    }
  }

  return result;
}

/**
 * Exponential moving average, `alpha = 2 / (span + 1)`.
 *
 * Seeded with the first defined value rather than an SMA. Values are emitted once
 * `span` observations have been folded in. Leading nulls are skipped.
 */
export function ema(values: readonly (number | null)[], span: number): IndicatorSeries {
  assertWindow('span', span);

  const alpha = 2 / (span + 1);
  const result: IndicatorSeries = [];
  let previous: number | null = null;
  let observations = 0;

  for (const value of values) {
    if (value === null) {
      result.push(null);
      continue;
    }

    // same as alpha * value + (1 - alpha) * previous, but exact on a constant input
    previous = previous === null ? value : previous + alpha * (value - previous);
    observations++;
    result.push(observations >= span ? previous : null);
  }

  return result;
}

/**
 * MACD line, signal line and histogram
 *
 * @returns line defined from `slow - 1`, signal and histogram from `slow + signal - 2`
 */
export function macd(
  close: readonly number[],
  fast: number = 12,
  slow: number = 26,
  signal: number = 9
): MacdResult {
  assertWindow('macdFast', fast);
  assertWindow('macdSlow', slow);
  assertWindow('macdSignal', signal);

  const fastEma = ema(close, fast);
  const slowEma = ema(close, slow);

  const line: IndicatorSeries = fastEma.map((fastValue, i) => {
    const slowValue = slowEma[i];
    return fastValue === null || slowValue === null ? null : fastValue - slowValue;
  });
  const signalLine = ema(line, signal);
  const histogram: IndicatorSeries = line.map((lineValue, i) => {
    const signalValue = signalLine[i];
    return lineValue === null || signalValue === null ? null : lineValue - signalValue;
  });

  return { macd: line, signal: signalLine, histogram };
}

/**
 * Trailing simple moving average, defined from `window - 1`
 */
export function sma(close: readonly number[], window: number): IndicatorSeries {
  assertWindow('window', window);

  const result = alignToInput(SMA.calculate({ period: window, values: [...close] }), close.length);

  // the library keeps a running sum; a constant window must average to exactly its value
  for (let t = window - 1; t < close.length; t++) {
    const slice = close.slice(t - window + 1, t + 1);
    if (Math.min(...slice) === Math.max(...slice)) {
      result[t] = close[t];
    }
  }
  return result;
}

/**
 * Bollinger Bands using the trailing population standard deviation
 */
export function bollinger(
  close: readonly number[],
  window: number = 20,
  k: number = 2
): BollingerResult {
  assertWindow('bollingerWindow', window);
  if (!Number.isFinite(k) || k <= 0) {
    throw new InvalidInputError('bollingerStdDev', `must be a positive number, got ${k}`);
  }

  const bands = BollingerBands.calculate({ period: window, values: [...close], stdDev: k });

  return {
    upper: alignToInput(bands.map((band) => band.upper), close.length),
    middle: alignToInput(bands.map((band) => band.middle), close.length),
    lower: alignToInput(bands.map((band) => band.lower), close.length),
  };
}

/**
 * Bars needed before every enabled rule can be evaluated at least once
 */
export function requiredWarmup(config: StrategyConfig): number {
  const warmups = config.indicators.map((indicator) => {
    switch (indicator) {
      case 'RSI':
        return config.rsiPeriod + 1;
      case 'MACD':
        // a crossover compares the bar with the one before it
        return config.macdSlow + config.macdSignal;
      case 'MA':
        return config.smaFastWindow;
    }
  });
  return Math.max(0, ...warmups);
}

/**
 * Attach every indicator to its bar
 */
export function buildIndicatorFrame(series: PriceSeries, config: StrategyConfig): IndicatorFrame {
  const close = series.map((bar) => bar.close);

  const rsiValues = rsi(close, config.rsiPeriod);
  const macdValues = macd(close, config.macdFast, config.macdSlow, config.macdSignal);
  const smaFast = sma(close, config.smaFastWindow);
  const smaSlow = sma(close, config.smaSlowWindow);
  const bands = bollinger(close, config.bollingerWindow, config.bollingerStdDev);

  return series.map((bar, i) => ({
    ...bar,
    rsi: rsiValues[i],
    macd: macdValues.macd[i],
    macdSignal: macdValues.signal[i],
    macdHistogram: macdValues.histogram[i],
    smaFast: smaFast[i],
    smaSlow: smaSlow[i],
    bbUpper: bands.upper[i],
    bbMid: bands.middle[i],
    bbLower: bands.lower[i],
  }));
}

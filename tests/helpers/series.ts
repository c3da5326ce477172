/**
 * Price series builders shared by tests
 */

import type { PriceBar } from '../../src/types.js';
import type { SimulationBar } from '../../src/simulation/types.js';

export const DAY_MS = 86_400_000;
export const START = Date.UTC(2024, 0, 1);

export function seriesFromCloses(closes: readonly number[]): PriceBar[] {
  return closes.map((close, i) => ({
    timestamp: START + i * DAY_MS,
    open: close,
    high: close,
    low: close,
    close,
    volume: 1000,
  }));
}

/**
 * `count` closes starting at `start`, moving by `step` each bar
 */
export function ramp(start: number, step: number, count: number): number[] {
  return Array.from({ length: count }, (_, i) => start + step * i);
}

/**
 * 200 falling by 2 for 20 bars (trough 162 at index 19), rising by 3 to 222 at
 * index 39, then falling by 3 for 8 bars to 198.
 */
export function troughPeakCloses(): number[] {
  const decline = ramp(200, -2, 20);
  const rise = ramp(165, 3, 20);
  const fall = ramp(219, -3, 8);
  return [...decline, ...rise, ...fall];
}

export function simulationBars(
  closes: readonly number[],
  buys: readonly number[] = [],
  sells: readonly number[] = []
): SimulationBar[] {
  return seriesFromCloses(closes).map((bar, i) => ({
    ...bar,
    buySignal: buys.includes(i),
    sellSignal: sells.includes(i),
  }));
}

/**
 * Tests for strategy configuration parsing
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_STRATEGY_CONFIG, parseStrategyConfig } from '../../src/strategy/schema.js';
import { InvalidInputError } from '../../src/errors.js';

function fieldOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof InvalidInputError) return error.field;
    throw error;
  }
  return undefined;
}

describe('parseStrategyConfig', () => {
  it('should fill in defaults', () => {
    expect(DEFAULT_STRATEGY_CONFIG).toEqual({
      rsiPeriod: 14,
      rsiOversold: 30,
      rsiOverbought: 70,
      macdFast: 12,
      macdSlow: 26,
      macdSignal: 9,
      combineLogic: 'AND',
      indicators: ['RSI', 'MACD'],
      smaFastWindow: 20,
      smaSlowWindow: 50,
      bollingerWindow: 20,
      bollingerStdDev: 2,
    });
  });

  it('should return a frozen config', () => {
    const config = parseStrategyConfig({ indicators: ['MA'] });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.indicators)).toBe(true);
  });

  it('should drop duplicate indicators', () => {
    const config = parseStrategyConfig({ indicators: ['RSI', 'MA', 'RSI'] });
    expect(config.indicators).toEqual(['RSI', 'MA']);
  });

  it('should reject oversold at or above overbought', () => {
    expect(fieldOf(() => parseStrategyConfig({ rsiOversold: 70, rsiOverbought: 70 }))).toBe(
      'strategy.rsiOverbought'
    );
  });

  it('should reject a fast MACD window not below the slow one', () => {
    expect(fieldOf(() => parseStrategyConfig({ macdFast: 26, macdSlow: 12 }))).toBe(
      'strategy.macdSlow'
    );
  });

  it('should reject an empty indicator set', () => {
    expect(fieldOf(() => parseStrategyConfig({ indicators: [] }))).toBe('strategy.indicators');
  });

  it('should reject unknown indicators', () => {
    expect(fieldOf(() => parseStrategyConfig({ indicators: ['VWAP'] }))).toBe(
      'strategy.indicators.0'
    );
  });

  it('should reject non-integer windows', () => {
    expect(fieldOf(() => parseStrategyConfig({ rsiPeriod: 0 }))).toBe('strategy.rsiPeriod');
    expect(fieldOf(() => parseStrategyConfig({ macdSignal: 2.5 }))).toBe('strategy.macdSignal');
  });

  it('should reject thresholds outside 0-100', () => {
    expect(fieldOf(() => parseStrategyConfig({ rsiOverbought: 120 }))).toBe(
      'strategy.rsiOverbought'
    );
  });

  it('should reject an unknown combine logic', () => {
    expect(fieldOf(() => parseStrategyConfig({ combineLogic: 'XOR' }))).toBe(
      'strategy.combineLogic'
    );
  });
});

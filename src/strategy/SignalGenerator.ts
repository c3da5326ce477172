/**
 * Signal Generator
 *
 * Turns indicator state into BUY/SELL decisions under a FLAT/LONG state machine.
 *
 * - Entry: enabled buy rules combined with AND or OR
 * - Exit: any enabled sell rule (always OR)
 * - A rule whose inputs are still warming up counts as not met
 */

import { EventEmitter } from 'eventemitter3';
import { logger } from '../logger.js';
import { assertValidPriceSeries } from '../validation.js';
import type { PositionState, PriceSeries } from '../types.js';
import { buildIndicatorFrame, requiredWarmup } from './indicators.js';
import type { StrategyConfig } from './schema.js';
import type {
  ConditionEvaluation,
  ConditionSet,
  IndicatorFrame,
  IndicatorToggle,
  SignalBar,
  SignalFrame,
  SignalGeneratorEvents,
} from './types.js';

export class SignalGenerator extends EventEmitter<SignalGeneratorEvents> {
  private readonly config: StrategyConfig;

  constructor(config: StrategyConfig) {
    super();
    this.config = config;

    logger.debug('Signal Generator initialized', {
      indicators: config.indicators,
      combineLogic: config.combineLogic,
      rsi: `${config.rsiPeriod} (${config.rsiOversold}/${config.rsiOverbought})`,
      macd: `${config.macdFast}/${config.macdSlow}/${config.macdSignal}`,
    });
  }

  /**
   * Compute indicators and walk the state machine over the whole series
   */
  public generate(series: PriceSeries): SignalFrame {
    assertValidPriceSeries(series);

    const required = requiredWarmup(this.config);
    if (series.length < required) {
      logger.warn('Insufficient data for indicator warm-up, no signals will fire', {
        available: series.length,
        required,
      });
      this.emit('insufficientData', series.length, required);
    }

    const frame = buildIndicatorFrame(series, this.config);
    const signals: SignalBar[] = [];
    let state: PositionState = 'FLAT';

    for (let t = 0; t < frame.length; t++) {
      const bar = frame[t];
      const evaluation = this.evaluateConditions(frame, t);
      let buySignal = false;
      let sellSignal = false;

      if (state === 'FLAT' && this.combineBuy(evaluation.buy)) {
        buySignal = true;
        state = 'LONG';
        this.emitSignal('BUY', t, bar.timestamp, bar.close, evaluation.buy);
      } else if (state === 'LONG' && this.combineSell(evaluation.sell)) {
        sellSignal = true;
        state = 'FLAT';
        this.emitSignal('SELL', t, bar.timestamp, bar.close, evaluation.sell);
      }

      signals.push({ ...bar, buySignal, sellSignal, positionState: state });
    }

    return signals;
  }

  /**
   * Raw per-indicator sub-conditions at bar `t`, before toggles and combination
   */
  public evaluateConditions(frame: IndicatorFrame, t: number): ConditionEvaluation {
    const bar = frame[t];
    const previous = t > 0 ? frame[t - 1] : undefined;
    const { rsiOversold, rsiOverbought } = this.config;

    const rsiBuy = bar.rsi !== null && bar.rsi < rsiOversold;
    const rsiSell = bar.rsi !== null && bar.rsi > rsiOverbought;

    let macdBuy = false;
    let macdSell = false;
    if (
      previous &&
      bar.macd !== null &&
      bar.macdSignal !== null &&
      previous.macd !== null &&
      previous.macdSignal !== null
    ) {
      macdBuy = bar.macd > bar.macdSignal && previous.macd <= previous.macdSignal;
      macdSell = bar.macd < bar.macdSignal && previous.macd >= previous.macdSignal;
    }

    const maBuy = bar.smaFast !== null && bar.close > bar.smaFast;
    const maSell = bar.smaFast !== null && bar.close < bar.smaFast;

    return {
      buy: { RSI: rsiBuy, MACD: macdBuy, MA: maBuy },
      sell: { RSI: rsiSell, MACD: macdSell, MA: maSell },
    };
  }

  public getConfig(): StrategyConfig {
    return this.config;
  }

  private combineBuy(conditions: ConditionSet): boolean {
    const { indicators, combineLogic } = this.config;
    return combineLogic === 'AND'
      ? indicators.every((indicator) => conditions[indicator])
      : indicators.some((indicator) => conditions[indicator]);
  }

  private combineSell(conditions: ConditionSet): boolean {
    return this.config.indicators.some((indicator) => conditions[indicator]);
  }

  private emitSignal(
    type: 'BUY' | 'SELL',
    index: number,
    timestamp: number,
    close: number,
    conditions: ConditionSet
  ): void {
    const triggers: IndicatorToggle[] = this.config.indicators.filter(
      (indicator) => conditions[indicator]
    );

    logger.debug('Signal detected', { type, index, timestamp, close, triggers });
    this.emit('signalDetected', { type, index, timestamp, close, triggers });
  }
}

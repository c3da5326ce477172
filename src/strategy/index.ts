export { SignalGenerator } from './SignalGenerator.js';
export {
  rsi,
  ema,
  macd,
  sma,
  bollinger,
  buildIndicatorFrame,
  requiredWarmup,
} from './indicators.js';
export { DEFAULT_STRATEGY_CONFIG, parseStrategyConfig, strategyConfigSchema } from './schema.js';
export type { StrategyConfig, StrategyConfigInput } from './schema.js';
export type {
  IndicatorToggle,
  CombineLogic,
  IndicatorSeries,
  MacdResult,
  BollingerResult,
  IndicatorValues,
  IndicatorBar,
  IndicatorFrame,
  SignalBar,
  SignalFrame,
  ConditionSet,
  ConditionEvaluation,
  SignalDetectedEvent,
  SignalGeneratorEvents,
} from './types.js';

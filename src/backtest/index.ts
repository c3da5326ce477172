export { Backtester, runBacktest } from './Backtester.js';
export type { BacktestOptions, BacktestResult, BacktesterEvents } from './types.js';

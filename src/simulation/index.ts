/**
 * Simulation Module
 *
 * Turns signals into fills, an equity curve and a closed-trade log.
 */

// Types
export type {
  SimulationBar,
  OpenTrade,
  Trade,
  TradeExecution,
  EquityPoint,
  EquityCurve,
  SimulationResult,
  BuySkippedEvent,
  SimulationEngineEvents,
} from './types.js';
export type { SimulationConfig, SimulationConfigInput } from './schema.js';

// Classes
export { SimulationEngine } from './SimulationEngine.js';
export { Ledger } from './Ledger.js';
export { parseSimulationConfig, simulationConfigSchema } from './schema.js';

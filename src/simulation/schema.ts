import { z } from 'zod';
import { parseInput } from '../validation.js';

export const simulationConfigSchema = z.object({
  /** Starting cash */
  initialCapital: z.number().positive().finite().default(10000),

  /** Commission charged on each side as a fraction of notional (0.001 = 0.1%) */
  commissionRate: z.number().min(0).lt(1).default(0.001),
});

export type SimulationConfigInput = z.input<typeof simulationConfigSchema>;

export type SimulationConfig = Readonly<z.output<typeof simulationConfigSchema>>;

export function parseSimulationConfig(input: unknown = {}): SimulationConfig {
  return Object.freeze(parseInput(simulationConfigSchema, input, 'simulation'));
}

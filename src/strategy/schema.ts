/**
 * Strategy configuration schema and defaults
 */

import { z } from 'zod';
import { parseInput } from '../validation.js';
import type { IndicatorToggle } from './types.js';

const windowSchema = z.number().int().positive();
const thresholdSchema = z.number().min(0).max(100);

export const strategyConfigSchema = z
  .object({
    rsiPeriod: windowSchema.default(14),
    rsiOversold: thresholdSchema.default(30),
    rsiOverbought: thresholdSchema.default(70),
    macdFast: windowSchema.default(12),
    macdSlow: windowSchema.default(26),
    macdSignal: windowSchema.default(9),
    combineLogic: z.enum(['AND', 'OR']).default('AND'),
    indicators: z
      .array(z.enum(['RSI', 'MACD', 'MA']))
      .min(1, 'at least one indicator must be enabled')
      .default(['RSI', 'MACD'])
      .transform((list) => [...new Set(list)]),
    /** Reference average for the MA rule */
    smaFastWindow: windowSchema.default(20),
    smaSlowWindow: windowSchema.default(50),
    bollingerWindow: windowSchema.default(20),
    bollingerStdDev: z.number().positive().default(2),
  })
  .superRefine((value, ctx) => {
    if (value.rsiOversold >= value.rsiOverbought) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['rsiOverbought'],
        message: `must be greater than rsiOversold (${value.rsiOversold})`,
      });
    }
    if (value.macdFast >= value.macdSlow) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['macdSlow'],
        message: `must be greater than macdFast (${value.macdFast})`,
      });
    }
  });

export type StrategyConfigInput = z.input<typeof strategyConfigSchema>;

type ParsedStrategyConfig = z.output<typeof strategyConfigSchema>;

export type StrategyConfig = Readonly<
  Omit<ParsedStrategyConfig, 'indicators'> & { indicators: readonly IndicatorToggle[] }
>;

/**
 * Validate and complete a strategy configuration. Throws InvalidInputError.
 */
export function parseStrategyConfig(input: unknown = {}): StrategyConfig {
  const parsed = parseInput(strategyConfigSchema, input, 'strategy');
  return Object.freeze({ ...parsed, indicators: Object.freeze([...parsed.indicators]) });
}

export const DEFAULT_STRATEGY_CONFIG: StrategyConfig = parseStrategyConfig({});

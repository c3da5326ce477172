#!/usr/bin/env node
/**
 * Signal Backtest Engine
 *
 * Entry point: loads a CSV price series, runs the configured strategy and logs the
 * performance report.
 *
 * Usage: signal-backtest <prices.csv>   (or PRICE_DATA_FILE in .env)
 */

import { Backtester } from './backtest/index.js';
import { config } from './config.js';
import { loadPriceSeriesFromCsv } from './data/csvLoader.js';
import { InvalidInputError, normalizeError } from './errors.js';
import { logger } from './logger.js';
import { formatOpenTrade, formatReport, formatTrade } from './metrics/index.js';
import { parseStrategyConfig } from './strategy/index.js';

async function main(): Promise<void> {
  const file = process.argv[2] ?? config.data.file;
  if (!file) {
    logger.error('No price data file given (argument or PRICE_DATA_FILE)');
    process.exitCode = 1;
    return;
  }

  try {
    logger.info('='.repeat(50));
    logger.info('Signal Backtest Engine');
    logger.info('='.repeat(50));

    const backtester = new Backtester({
      strategy: parseStrategyConfig(config.strategy),
      simulation: {
        initialCapital: config.backtest.initialCapital,
        commissionRate: config.backtest.commissionRate,
      },
      metrics: {
        riskFreeRate: config.backtest.riskFreeRate,
        periodsPerYear: config.backtest.periodsPerYear,
      },
    });

    const series = await loadPriceSeriesFromCsv(file);
    const result = backtester.run(series);

    logger.info(`Performance report\n${formatReport(result.report)}`);

    if (result.trades.length > 0) {
      logger.info(`Closed trades\n${result.trades.map(formatTrade).join('\n')}`);
    }
    if (result.openTrade) {
      logger.info(`Open position\n${formatOpenTrade(result.openTrade)}`);
    }
  } catch (error) {
    if (error instanceof InvalidInputError) {
      logger.error('Invalid input', { field: error.field, details: error.details });
    } else {
      const normalizedError = normalizeError(error);
      logger.error('Backtest failed', { error: normalizedError.message, stack: normalizedError.stack });
    }
    process.exitCode = 1;
  }
}

// Run
main().catch((error: unknown) => {
  logger.error('Unexpected failure', { error: normalizeError(error).message });
  process.exitCode = 1;
});

import { config as dotenvConfig } from 'dotenv';

// Load environment variables
dotenvConfig();

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (value === undefined) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getOptionalEnvVar(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

function getEnvNumber(key: string, defaultValue: number): number {
  return getOptionalEnvNumber(key) ?? defaultValue;
}

/**
 * Numeric env var without a default here; the owning module's schema supplies it.
 */
function getOptionalEnvNumber(key: string): number | undefined {
  const value = getOptionalEnvVar(key);
  if (value === undefined) {
    return undefined;
  }
  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number`);
  }
  return parsed;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  return value.toLowerCase() === 'true';
}

function getOptionalEnvList(key: string): string[] | undefined {
  const value = getOptionalEnvVar(key);
  if (value === undefined) {
    return undefined;
  }
  return value
    .split(',')
    .map((item) => item.trim().toUpperCase())
    .filter((item) => item.length > 0);
}

export const config = {
  // Simulation & metrics
  backtest: {
    /** Starting cash */
    initialCapital: getOptionalEnvNumber('INITIAL_CAPITAL'),

    /** Flat commission per side (0.001 = 0.1%) */
    commissionRate: getOptionalEnvNumber('COMMISSION_RATE'),

    /** Annual risk-free rate for Sharpe (0.02 = 2%) */
    riskFreeRate: getOptionalEnvNumber('RISK_FREE_RATE'),

    /** Bars per year used for annualization */
    periodsPerYear: getOptionalEnvNumber('PERIODS_PER_YEAR'),
  },

  // Strategy Configuration
  strategy: {
    rsiPeriod: getOptionalEnvNumber('RSI_PERIOD'),
    rsiOversold: getOptionalEnvNumber('RSI_OVERSOLD'),
    rsiOverbought: getOptionalEnvNumber('RSI_OVERBOUGHT'),
    macdFast: getOptionalEnvNumber('MACD_FAST'),
    macdSlow: getOptionalEnvNumber('MACD_SLOW'),
    macdSignal: getOptionalEnvNumber('MACD_SIGNAL'),
    combineLogic: getOptionalEnvVar('COMBINE_LOGIC')?.toUpperCase(),
    indicators: getOptionalEnvList('INDICATORS'),
    smaFastWindow: getOptionalEnvNumber('SMA_FAST'),
    smaSlowWindow: getOptionalEnvNumber('SMA_SLOW'),
    bollingerWindow: getOptionalEnvNumber('BB_PERIOD'),
    bollingerStdDev: getOptionalEnvNumber('BB_STD_DEV'),
  },

  // Price data
  data: {
    /** CSV file used when no path is given on the command line */
    file: getOptionalEnvVar('PRICE_DATA_FILE'),
  },

  // Logging Configuration
  logging: {
    level: getEnvVar('LOG_LEVEL', 'info'),

    /** Directory for error/combined log files; console only when unset */
    dir: getOptionalEnvVar('LOG_DIR'),

    silent: getEnvBoolean('LOG_SILENT', false),

    /** Max size per log file in bytes */
    maxFileSize: getEnvNumber('LOG_MAX_FILE_SIZE', 5242880),
  },
} as const;

export type Config = typeof config;

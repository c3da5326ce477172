/**
 * Error types raised by the backtest engine.
 *
 * All failures are synchronous and reach the immediate caller; nothing inside the
 * engine retries. Insufficient history is not an error: indicators stay `null` and
 * no signals fire.
 */

export type BacktestErrorCode = 'INVALID_INPUT';

export class BacktestError extends Error {
  readonly code: BacktestErrorCode;

  constructor(code: BacktestErrorCode, message: string) {
    super(message);
    this.name = 'BacktestError';
    this.code = code;
  }
}

/**
 * Malformed price series, configuration or file content.
 * `field` names the first offending value, `details` lists every problem found.
 */
export class InvalidInputError extends BacktestError {
  readonly field: string;
  readonly details: readonly string[];

  constructor(field: string, message: string, details: readonly string[] = []) {
    super('INVALID_INPUT', `Invalid ${field}: ${message}`);
    this.name = 'InvalidInputError';
    this.field = field;
    this.details = details.length > 0 ? details : [`${field}: ${message}`];
  }
}

export function normalizeError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Input Validation
 *
 * Up-front checks so that no stage ever runs on a malformed series or config.
 */

import type { z } from 'zod';
import { InvalidInputError } from './errors.js';
import type { PriceSeries, ValidationIssue, ValidationResult } from './types.js';

/**
 * Validate a price series before any indicator or simulation work
 */
export function validatePriceSeries(series: PriceSeries): ValidationResult {
  const issues: ValidationIssue[] = [];

  // 1. Non-empty
  if (series.length === 0) {
    issues.push({ field: 'series', message: 'price series is empty' });
    return { valid: false, issues };
  }

  series.forEach((bar, index) => {
    const at = `series[${index}]`;

    // 2. Timestamp well-formed and strictly increasing
    if (!Number.isFinite(bar.timestamp)) {
      issues.push({ field: `${at}.timestamp`, message: 'timestamp is not a finite number' });
    } else if (index > 0) {
      const previous = series[index - 1];
      if (previous && bar.timestamp <= previous.timestamp) {
        issues.push({
          field: `${at}.timestamp`,
          message: `timestamp ${bar.timestamp} is not after previous ${previous.timestamp}`,
        });
      }
    }

    // 3. Prices positive
    for (const key of ['open', 'high', 'low', 'close'] as const) {
      const value = bar[key];
      if (!Number.isFinite(value) || value <= 0) {
        issues.push({ field: `${at}.${key}`, message: `price must be positive, got ${value}` });
      }
    }

    // 4. Range consistency
    if (bar.high < bar.low) {
      issues.push({ field: `${at}.high`, message: `high ${bar.high} is below low ${bar.low}` });
    }

    // 5. Volume
    if (!Number.isFinite(bar.volume) || bar.volume < 0) {
      issues.push({ field: `${at}.volume`, message: `volume must be non-negative, got ${bar.volume}` });
    }
  });

  return { valid: issues.length === 0, issues };
}

/**
 * Throw InvalidInputError for the first problem, carrying all of them as details
 */
export function assertValidPriceSeries(series: PriceSeries): void {
  const result = validatePriceSeries(series);
  const [first] = result.issues;
  if (first) {
    throw new InvalidInputError(
      first.field,
      first.message,
      result.issues.map((issue) => `${issue.field}: ${issue.message}`)
    );
  }
}

/**
 * Parse a config object with its zod schema, mapping schema failures to InvalidInputError
 */
export function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  context: string
): z.output<S> {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const details = result.error.issues.map(
    (issue) => `${[context, ...issue.path].join('.')}: ${issue.message}`
  );
  const [first] = result.error.issues;
  const field = first ? [context, ...first.path].join('.') : context;
  throw new InvalidInputError(field, first?.message ?? 'invalid value', details);
}

/**
 * CSV Price Loader
 *
 * Reads an OHLCV series from a CSV file with a header row. Accepted time columns are
 * `timestamp` (epoch milliseconds) or `date` (any string Date.parse understands).
 * Headers are matched case-insensitively, so `Date,Open,High,Low,Close,Volume`
 * exports work unchanged. Rows keep their file order.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { logger } from '../logger.js';
import { InvalidInputError, normalizeError } from '../errors.js';
import { parseInput } from '../validation.js';
import type { PriceBar, PriceSeries } from '../types.js';

const priceField = z.coerce.number();

const csvRowSchema = z
  .object({
    timestamp: z.string().optional(),
    date: z.string().optional(),
    open: priceField,
    high: priceField,
    low: priceField,
    close: priceField,
    volume: z
      .string()
      .optional()
      .transform((value) => (value === undefined || value === '' ? 0 : Number(value)))
      .pipe(z.number()),
  })
  .transform((row, ctx): PriceBar => {
    const raw = row.timestamp ?? row.date ?? '';
    const time = /^\d+$/.test(raw) ? Number(raw) : Date.parse(raw);
    if (Number.isNaN(time)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [row.timestamp !== undefined ? 'timestamp' : 'date'],
        message: `cannot parse time "${raw}"`,
      });
      return z.NEVER;
    }

    return {
      timestamp: time,
      open: row.open,
      high: row.high,
      low: row.low,
      close: row.close,
      volume: row.volume,
    };
  });

const csvRecordsSchema = z.array(z.record(z.string()));

/**
 * Parse CSV text into a price series. Throws InvalidInputError naming the bad row.
 */
export function parseCsvPriceSeries(content: string): PriceSeries {
  let records: unknown;
  try {
    records = parse(content, {
      columns: (header: string[]) => header.map((column) => column.trim().toLowerCase()),
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    throw new InvalidInputError('csv', normalizeError(error).message);
  }

  const rows = parseInput(csvRecordsSchema, records, 'csv');
  return rows.map((row, index) => parseInput(csvRowSchema, row, `csv.rows[${index}]`));
}

/**
 * Read and parse a CSV file; relative paths resolve against the working directory
 */
export async function loadPriceSeriesFromCsv(filePath: string): Promise<PriceSeries> {
  const resolved = path.isAbsolute(filePath) ? filePath : path.join(process.cwd(), filePath);

  const content = await fs.readFile(resolved, 'utf-8');
  const series = parseCsvPriceSeries(content);

  logger.info('Price data loaded', { file: resolved, bars: series.length });
  return series;
}

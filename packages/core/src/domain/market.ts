/**
 * Market data types
 */

import { z } from 'zod';
import { DateTime } from 'luxon';

/**
 * OHLCV bar. `timestamp` is epoch milliseconds (UTC).
 *
 * Expected: low <= open, close <= high. The quality checker reports
 * violations instead of the schema rejecting them.
 */
export const BarSchema = z.object({
  timestamp: z.number().int(),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number().nonnegative(),
});

export type Bar = z.infer<typeof BarSchema>;

const nullableNumber = z.number().nullable().optional();

/**
 * Raw bar as received from a file or provider; any field may be missing
 */
export const BarInputSchema = z.object({
  timestamp: z.union([z.number(), z.string()]).nullable().optional(),
  open: nullableNumber,
  high: nullableNumber,
  low: nullableNumber,
  close: nullableNumber,
  volume: nullableNumber,
});

export type BarInput = z.infer<typeof BarInputSchema>;

export const BarsBySymbolSchema = z.record(z.string().min(1), z.array(BarInputSchema));

export type BarsBySymbol = Record<string, Bar[]>;

/**
 * Parse an epoch-ms number or ISO-8601 string into epoch milliseconds
 */
export function parseTimestamp(value: number | string | null | undefined): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string') {
    const parsed = DateTime.fromISO(value, { zone: 'utc' });
    return parsed.isValid ? parsed.toMillis() : undefined;
  }
  return undefined;
}

function finite(value: number | null | undefined): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Convert a raw bar into a complete Bar, or undefined when a field is unusable
 */
export function toBar(input: BarInput): Bar | undefined {
  const timestamp = parseTimestamp(input.timestamp);
  const open = finite(input.open);
  const high = finite(input.high);
  const low = finite(input.low);
  const close = finite(input.close);
  const volume = finite(input.volume);
  if (
    timestamp === undefined ||
    open === undefined ||
    high === undefined ||
    low === undefined ||
    close === undefined ||
    volume === undefined
  ) {
    return undefined;
  }
  return { timestamp, open, high, low, close, volume };
}

/**
 * Complete bars sorted by timestamp. Incomplete rows are dropped and counted.
 */
export function normalizeBars(inputs: BarInput[]): { bars: Bar[]; dropped: number } {
  const bars: Bar[] = [];
  let dropped = 0;
  for (const input of inputs) {
    const bar = toBar(input);
    if (bar) {
      bars.push(bar);
    } else {
      dropped++;
    }
  }
  bars.sort((a, b) => a.timestamp - b.timestamp);
  return { bars, dropped };
}

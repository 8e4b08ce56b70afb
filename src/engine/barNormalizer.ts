/**
 * Bar Normalizer
 * Turns provider payloads (row records or column arrays) into PriceBars
 * sorted by ascending time. Rows with a missing or non-numeric field are
 * dropped; for duplicated timestamps the last row wins.
 */

import { z } from 'zod';
import type { PriceBar } from '../modules/smartMoney/types.js';

const FIELDS = ['time', 'open', 'high', 'low', 'close'] as const;

const RecordRowsSchema = z.array(z.record(z.unknown()));

const ColumnsSchema = z.object({
  time: z.array(z.unknown()),
  open: z.array(z.unknown()),
  high: z.array(z.unknown()),
  low: z.array(z.unknown()),
  close: z.array(z.unknown()),
});

export type RawRow = Record<string, unknown>;
export type RawColumns = z.infer<typeof ColumnsSchema>;
export type RawRates = readonly object[] | RawColumns;

export interface NormalizedRates {
  rows: number;        // rows received, before cleaning
  bars: PriceBar[];
}

function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return NaN;
}

/**
 * Epoch seconds from a number, numeric string, ISO string or Date.
 */
function toEpochSeconds(value: unknown): number {
  if (value instanceof Date) return value.getTime() / 1000;
  if (typeof value === 'string' && value.trim() !== '' && Number.isNaN(Number(value))) {
    return Date.parse(value) / 1000;
  }
  return toNumber(value);
}

function toRows(columns: RawColumns): RawRow[] {
  return columns.time.map((time, i) => ({
    time,
    open: columns.open[i],
    high: columns.high[i],
    low: columns.low[i],
    close: columns.close[i],
  }));
}

function toBar(row: RawRow): PriceBar | null {
  const bar: PriceBar = {
    time: toEpochSeconds(row.time),
    open: toNumber(row.open),
    high: toNumber(row.high),
    low: toNumber(row.low),
    close: toNumber(row.close),
  };
  return FIELDS.every(f => Number.isFinite(bar[f])) ? bar : null;
}

/**
 * Null when the payload has neither shape or lacks one of the OHLC fields
 * entirely.
 */
export function normalizeRates(raw: unknown): NormalizedRates | null {
  let rows: RawRow[];

  const columns = ColumnsSchema.safeParse(raw);
  if (columns.success) {
    rows = toRows(columns.data);
  } else {
    const records = RecordRowsSchema.safeParse(raw);
    if (!records.success) return null;
    rows = records.data;
  }

  if (rows.length === 0) return { rows: 0, bars: [] };

  const hasAllFields = FIELDS.every(f => rows.some(row => f in row));
  if (!hasAllFields) return null;

  const byTime = new Map<number, PriceBar>();
  for (const row of rows) {
    const bar = toBar(row);
    if (bar) byTime.set(bar.time, bar);
  }

  const bars = [...byTime.values()].sort((a, b) => a.time - b.time);
  return { rows: rows.length, bars };
}
